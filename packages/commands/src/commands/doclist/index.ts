import { writeFile } from "node:fs/promises";
import path from "node:path";
import { CliError, CLI_ERROR_CODES, createBufferSink } from "@patchpile/cli-core";
import type { CommandUnit } from "../../registry/types";
import { writeMarkupCommandList } from "../../presentation/command-list";

const doclist: CommandUnit = {
  usage: ["[--output <file>]"],
  kind: "repo",
  help: "Print the command list as AsciiDoc",
  description:
    "Write the AsciiDoc command list used by the manual pages, to standard\n" +
    "output or to the given file.",
  async run(ctx, _argv, flags) {
    const output = flags.output;
    if (output === true) {
      throw new CliError(CLI_ERROR_CODES.E_INVALID_FLAGS, "Flag --output requires a file name");
    }
    const opts = { linkMacro: ctx.config.docs.linkMacro };

    if (!output || output === "-") {
      if (ctx.presenter.isJSON) {
        const sink = createBufferSink();
        writeMarkupCommandList(ctx.commands, sink, opts);
        return { markup: sink.toString() };
      }
      writeMarkupCommandList(ctx.commands, ctx.presenter.out, opts);
      return 0;
    }

    const file = path.resolve(ctx.cwd, output);
    const sink = createBufferSink();
    writeMarkupCommandList(ctx.commands, sink, opts);
    try {
      await writeFile(file, sink.toString(), "utf8");
    } catch (error) {
      throw new CliError(
        CLI_ERROR_CODES.E_IO_WRITE,
        `Cannot write ${file}: ${error instanceof Error ? error.message : String(error)}`,
        { path: file },
        { cause: error },
      );
    }
    ctx.logger.debug("Command list written", { file });
    return ctx.presenter.isJSON ? { file } : 0;
  },
};

export default doclist;
