import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    bin: "src/bin.ts",
  },
  format: ["esm"],
  target: "node20",
  platform: "node",
  sourcemap: true,
  external: ["@patchpile/cli-core", "@patchpile/cli-commands"],
  skipNodeModulesBundle: true,
  clean: true,
});
