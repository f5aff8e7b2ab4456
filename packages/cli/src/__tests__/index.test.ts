import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { createBufferSink, type BufferSink } from "@patchpile/cli-core";
import { run } from "../index";

const FIXTURE_COMMANDS = fileURLToPath(
  new URL("../../../commands/src/registry/__tests__/fixtures/commands", import.meta.url),
);

const BUILTIN_LIST =
  "Repository commands:\n" +
  "  cmdlist  Generate the command cache\n" +
  "  doclist  Print the command list as AsciiDoc\n" +
  "  help     Print help for a command or list all commands\n" +
  "  version  Print version information\n";

const GENERAL_HELP_HEAD = "usage: pile <command> [options]\n\nGenerally available commands:\n";
const GENERAL_HELP_TAIL = "\nUse 'pile help <command>' for more information on a command.\n";

describe("pile", () => {
  let dir: string;
  let out: BufferSink;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  async function pile(argv: string[], env: NodeJS.ProcessEnv = { PATCHPILE_NO_CACHE: "1" }) {
    return run(argv, { cwd: dir, env, out });
  }

  async function writeConfig(yaml: string): Promise<void> {
    await writeFile(path.join(dir, "patchpile.config.yaml"), yaml, "utf8");
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "pile-cli-"));
    await mkdir(path.join(dir, ".git"));
    out = createBufferSink();
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  describe("general help", () => {
    it("lists the builtin commands when no command is given", async () => {
      expect(await pile([])).toBe(0);
      expect(out.toString()).toBe(GENERAL_HELP_HEAD + BUILTIN_LIST + GENERAL_HELP_TAIL);
    });

    it("treats a bare --help the same way", async () => {
      expect(await pile(["--help"])).toBe(0);
      expect(out.toString()).toBe(GENERAL_HELP_HEAD + BUILTIN_LIST + GENERAL_HELP_TAIL);
    });

    it("includes commands from configured directories, grouped by kind", async () => {
      await writeConfig(`commandDirs:\n  - ${JSON.stringify(FIXTURE_COMMANDS)}\n`);

      expect(await pile(["help"])).toBe(0);
      expect(out.toString()).toBe(
        GENERAL_HELP_HEAD +
          BUILTIN_LIST +
          "\n" +
          "Stack (branch) commands:\n" +
          "  series   Print the patch series\n" +
          "\n" +
          "Patch commands:\n" +
          "  new      Create a new, empty patch\n" +
          "  refresh  Generate a new commit for the current patch\n" +
          "\n" +
          "Index/worktree commands:\n" +
          "  status   Show the tree status\n" +
          GENERAL_HELP_TAIL,
      );
    });
  });

  describe("dispatch", () => {
    it("runs a command by name", async () => {
      expect(await pile(["version"])).toBe(0);
      expect(logSpy).toHaveBeenCalledWith("pile 0.1.0");
    });

    it("maps --version to the version command", async () => {
      expect(await pile(["--version"])).toBe(0);
      expect(logSpy).toHaveBeenCalledWith("pile 0.1.0");
    });

    it("maps <command> --help to the help command", async () => {
      expect(await pile(["version", "--help"])).toBe(0);
      expect(out.toString()).toBe("usage: pile version\n\nPrint version information\n");
    });

    it("resolves an unambiguous prefix", async () => {
      expect(await pile(["vers"])).toBe(0);
      expect(logSpy).toHaveBeenCalledWith("pile 0.1.0");
    });

    it("loads directory commands by module name", async () => {
      await writeConfig(`commandDirs:\n  - ${JSON.stringify(FIXTURE_COMMANDS)}\n`);

      expect(await pile(["help", "new"])).toBe(0);
      expect(out.toString()).toBe("usage: pile new [options] [<name>]\n\nCreate a new, empty patch\n");
    });

    it("refuses a directory module that shadows a builtin module", async () => {
      await mkdir(path.join(dir, "cmds"));
      await writeFile(
        path.join(dir, "cmds", "help.mjs"),
        'export const usage = [""];\n' +
          'export const name = "hello";\n' +
          'export const kind = "patch";\n' +
          'export const help = "Say hello";\n' +
          "export function run() {\n  return 0;\n}\n",
        "utf8",
      );
      await writeConfig("commandDirs:\n  - ./cmds\n");

      expect(await pile(["hello"])).toBe(70);
      expect(errorSpy).toHaveBeenCalledWith(
        'E_DUPLICATE_COMMAND: Command module "help" is provided twice (commands "help" and "hello")',
      );
    });

    it("exits with a usage error for unknown commands", async () => {
      expect(await pile(["frobnicate"])).toBe(64);
      expect(errorSpy).toHaveBeenCalledWith("E_UNKNOWN_COMMAND: Unknown command: frobnicate");
    });

    it("exits with a usage error for ambiguous prefixes", async () => {
      await writeConfig(`commandDirs:\n  - ${JSON.stringify(FIXTURE_COMMANDS)}\n`);

      expect(await pile(["s"])).toBe(64);
      expect(errorSpy).toHaveBeenCalledWith(
        "E_AMBIGUOUS_COMMAND: Ambiguous command: s (could be series, status)",
      );
    });

    it("exits with a usage error for bad global flags", async () => {
      expect(await pile(["--log-level", "loud"])).toBe(64);
      expect(errorSpy).toHaveBeenCalledWith(
        "E_INVALID_FLAGS: Invalid value for --log-level: loud. Must be one of: trace, debug, info, warn, error, silent",
      );
    });

    it("exits with a configuration error for a missing --config file", async () => {
      expect(await pile(["version", "--config", "absent.yaml"])).toBe(78);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("generated listings", () => {
    const MARKUP =
      "Repository commands\n" +
      "~~~~~~~~~~~~~~~~~~~\n" +
      "\n" +
      "linkstg:cmdlist[]::\n" +
      "    Generate the command cache\n" +
      "linkstg:doclist[]::\n" +
      "    Print the command list as AsciiDoc\n" +
      "linkstg:help[]::\n" +
      "    Print help for a command or list all commands\n" +
      "linkstg:version[]::\n" +
      "    Print version information\n" +
      "\n";

    it("prints the command cache with cmdlist --output -", async () => {
      expect(await pile(["cmdlist", "--output", "-"])).toBe(0);
      expect(out.toString()).toBe(
        "{\n" +
          '  "version": 1,\n' +
          '  "commands": {\n' +
          '    "cmdlist": ["cmdlist", "Repository commands", "Generate the command cache"],\n' +
          '    "doclist": ["doclist", "Repository commands", "Print the command list as AsciiDoc"],\n' +
          '    "help": ["help", "Repository commands", "Print help for a command or list all commands"],\n' +
          '    "version": ["version", "Repository commands", "Print version information"]\n' +
          "  }\n" +
          "}\n",
      );
    });

    it("prints the markup listing with doclist", async () => {
      expect(await pile(["doclist"])).toBe(0);
      expect(out.toString()).toBe(MARKUP);
    });

    it("prints the markup listing with doclist --output -", async () => {
      expect(await pile(["doclist", "--output", "-"])).toBe(0);
      expect(out.toString()).toBe(MARKUP);
    });
  });

  describe("JSON mode", () => {
    it("wraps command results", async () => {
      expect(await pile(["version", "--json"])).toBe(0);
      expect(logSpy).toHaveBeenCalledWith(JSON.stringify({ ok: true, data: { version: "0.1.0" } }));
    });

    it("reports errors with their code and details", async () => {
      expect(await pile(["frobnicate", "--json"])).toBe(64);
      expect(logSpy).toHaveBeenCalledWith(
        JSON.stringify({
          ok: false,
          error: {
            code: "E_UNKNOWN_COMMAND",
            message: "Unknown command: frobnicate",
            details: { word: "frobnicate" },
          },
        }),
      );
    });
  });

  describe("command cache", () => {
    const CACHE =
      "{\n" +
      '  "version": 1,\n' +
      '  "commands": {\n' +
      '    "version": ["version", "Repository commands", "Print version information"]\n' +
      "  }\n" +
      "}\n";

    beforeEach(async () => {
      await writeConfig("cache:\n  path: cache/commands.json\n");
    });

    it("lists commands from the cache when one exists", async () => {
      await mkdir(path.join(dir, "cache"));
      await writeFile(path.join(dir, "cache", "commands.json"), CACHE, "utf8");

      expect(await pile([], {})).toBe(0);
      expect(out.toString()).toBe(
        GENERAL_HELP_HEAD +
          "Repository commands:\n" +
          "  version  Print version information\n" +
          GENERAL_HELP_TAIL,
      );
    });

    it("ignores the cache under --no-cache", async () => {
      await mkdir(path.join(dir, "cache"));
      await writeFile(path.join(dir, "cache", "commands.json"), CACHE, "utf8");

      expect(await pile(["--no-cache"], {})).toBe(0);
      expect(out.toString()).toBe(GENERAL_HELP_HEAD + BUILTIN_LIST + GENERAL_HELP_TAIL);
    });

    it("discovers commands when no cache has been generated", async () => {
      expect(await pile([], {})).toBe(0);
      expect(out.toString()).toBe(GENERAL_HELP_HEAD + BUILTIN_LIST + GENERAL_HELP_TAIL);
    });

    it("fails on a corrupt cache", async () => {
      await mkdir(path.join(dir, "cache"));
      await writeFile(path.join(dir, "cache", "commands.json"), "{ not json", "utf8");

      expect(await pile([], {})).toBe(70);
    });

    it("regenerates the cache with cmdlist", async () => {
      expect(await pile(["cmdlist"], {})).toBe(0);
      const file = path.join(dir, "cache", "commands.json");
      expect(logSpy).toHaveBeenCalledWith(`Wrote 4 commands to ${file}`);

      out = createBufferSink();
      expect(await pile(["help"], {})).toBe(0);
      expect(out.toString()).toBe(GENERAL_HELP_HEAD + BUILTIN_LIST + GENERAL_HELP_TAIL);
    });
  });
});
