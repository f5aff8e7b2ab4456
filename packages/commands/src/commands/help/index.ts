import type { CommandUnit } from "../../registry/types";
import { findCommand } from "../../registry/lookup";
import { groupCommands, writePrettyCommandList } from "../../presentation/command-list";
import { writeCommandHelp, writeGeneralHelp } from "../../presentation/command-help";

const help: CommandUnit = {
  usage: ["[<command>]"],
  kind: "repo",
  help: "Print help for a command or list all commands",
  description:
    "Without an argument, list every command grouped by kind. With a command\n" +
    "name, or an unambiguous prefix of one, print that command's usage.",
  async run(ctx, argv) {
    const [word] = argv;
    const out = ctx.presenter.out;

    if (word === undefined) {
      if (ctx.presenter.isJSON) {
        return { groups: [...groupCommands(ctx.commands)] };
      }
      writeGeneralHelp(out, () => writePrettyCommandList(ctx.commands, out));
      return 0;
    }

    const cmd = findCommand(ctx.commands, word);
    const unit = await ctx.loadCommand(cmd.module);
    if (ctx.presenter.isJSON) {
      return {
        name: cmd.name,
        kind: cmd.kind,
        help: cmd.help,
        usage: unit.usage,
        ...(unit.description ? { description: unit.description } : {}),
      };
    }
    writeCommandHelp(cmd, unit, out);
    return 0;
  },
};

export default help;
