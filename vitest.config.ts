import { defineConfig } from "vitest/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@patchpile/cli-core": resolve(root, "./packages/core/src"),
      "@patchpile/cli-commands": resolve(root, "./packages/commands/src"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.spec.ts", "packages/**/src/**/*.test.ts"],
    setupFiles: [resolve(root, "./vitest.setup.ts")],
  },
});
