import path from "node:path";
import { CliError, CLI_ERROR_CODES } from "@patchpile/cli-core";
import type { CommandUnit } from "../../registry/types";
import { defaultCachePath, serializeCommandTable, writeCommandCache } from "../../registry/cache";

const cmdlist: CommandUnit = {
  usage: ["[--output <file>]"],
  kind: "repo",
  help: "Generate the command cache",
  description:
    "Discover every command, ignoring any existing cache, and write the\n" +
    "command table to the cache file. '--output -' prints it instead.",
  async run(ctx, _argv, flags) {
    const output = flags.output;
    if (output === true) {
      throw new CliError(CLI_ERROR_CODES.E_INVALID_FLAGS, "Flag --output requires a file name");
    }

    const table = await ctx.discoverCommands();

    if (output === "-") {
      serializeCommandTable(table, ctx.presenter.out);
      return 0;
    }

    const file = output
      ? path.resolve(ctx.cwd, output)
      : ctx.config.cache.path ?? defaultCachePath();
    await writeCommandCache(table, file);

    if (ctx.presenter.isJSON) {
      return { file, commands: table.size };
    }
    ctx.presenter.write(`Wrote ${table.size} commands to ${file}`);
    return 0;
  },
};

export default cmdlist;
