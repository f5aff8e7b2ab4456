import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { loadConfig, parseConfig, detectRepoRoot } from "../config";
import { CliError, CLI_ERROR_CODES } from "../errors";

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected promise to reject");
}

describe("config", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "pile-config-"));
    await mkdir(path.join(root, ".git"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("detectRepoRoot", () => {
    it("finds the nearest ancestor with .git", async () => {
      const nested = path.join(root, "a", "b");
      await mkdir(nested, { recursive: true });

      expect(detectRepoRoot(nested)).toBe(root);
    });
  });

  describe("parseConfig", () => {
    it("fills defaults", () => {
      expect(parseConfig({}, "/repo")).toEqual({
        commandDirs: [],
        cache: { enabled: true },
        docs: { linkMacro: "linkstg" },
      });
    });

    it("resolves paths against the base directory", () => {
      const config = parseConfig(
        { commandDirs: ["tools/cmds"], cache: { path: ".pile/cache.json" } },
        "/repo",
      );

      expect(config.commandDirs).toEqual([path.resolve("/repo", "tools/cmds")]);
      expect(config.cache.path).toBe(path.resolve("/repo", ".pile/cache.json"));
    });

    it("rejects unknown keys", () => {
      expect(() => parseConfig({ commandDir: ["x"] }, "/repo")).toThrow(CliError);
    });

    it("rejects a malformed link macro", () => {
      expect(() => parseConfig({ docs: { linkMacro: "link stg" } }, "/repo")).toThrow(
        "docs.linkMacro: linkMacro must be an AsciiDoc macro name",
      );
    });
  });

  describe("loadConfig", () => {
    it("returns defaults when no file exists", async () => {
      const config = await loadConfig({ cwd: root, env: {} });

      expect(config).toEqual({
        commandDirs: [],
        cache: { enabled: true },
        docs: { linkMacro: "linkstg" },
      });
    });

    it("reads YAML from the repository root", async () => {
      const file = path.join(root, "patchpile.config.yaml");
      await writeFile(
        file,
        "commandDirs:\n  - ./commands\ncache:\n  enabled: false\ndocs:\n  linkMacro: linkpile\n",
      );

      const config = await loadConfig({ cwd: path.join(root), env: {} });

      expect(config).toEqual({
        commandDirs: [path.join(root, "commands")],
        cache: { enabled: false },
        docs: { linkMacro: "linkpile" },
        source: file,
      });
    });

    it("reads JSON config files", async () => {
      await writeFile(
        path.join(root, "patchpile.config.json"),
        JSON.stringify({ commandDirs: ["plugins"] }),
      );

      const config = await loadConfig({ cwd: root, env: {} });

      expect(config.commandDirs).toEqual([path.join(root, "plugins")]);
    });

    it("honours an explicit config path", async () => {
      const file = path.join(root, "custom.yml");
      await writeFile(file, "cache:\n  path: out/list.json\n");

      const config = await loadConfig({ cwd: root, configPath: "custom.yml", env: {} });

      expect(config.cache.path).toBe(path.join(root, "out", "list.json"));
    });

    it("fails when an explicit config file is missing", async () => {
      const error = await rejection(loadConfig({ cwd: root, configPath: "nope.yml", env: {} }));

      expect(error).toBeInstanceOf(CliError);
      expect(error).toMatchObject({ code: CLI_ERROR_CODES.E_CONFIG });
    });

    it("fails on malformed YAML", async () => {
      await writeFile(path.join(root, "patchpile.config.yml"), "commandDirs: [unterminated\n");

      const error = await rejection(loadConfig({ cwd: root, env: {} }));

      expect(error).toMatchObject({ code: CLI_ERROR_CODES.E_CONFIG });
    });

    it("lets PATCHPILE_NO_CACHE disable the cache", async () => {
      const config = await loadConfig({ cwd: root, env: { PATCHPILE_NO_CACHE: "1" } });

      expect(config.cache.enabled).toBe(false);
    });

    it("ignores PATCHPILE_NO_CACHE=0", async () => {
      const config = await loadConfig({ cwd: root, env: { PATCHPILE_NO_CACHE: "0" } });

      expect(config.cache.enabled).toBe(true);
    });
  });
});
