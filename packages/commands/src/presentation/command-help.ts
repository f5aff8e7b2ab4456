import type { TextSink } from "@patchpile/cli-core";
import type { CommandDeclaration, CommandDescriptor } from "../registry/types";

export const PROGRAM_NAME = "pile";

export function writeGeneralHelp(sink: TextSink, writeList: () => void): void {
  sink.write(`usage: ${PROGRAM_NAME} <command> [options]\n`);
  sink.write("\n");
  sink.write("Generally available commands:\n");
  writeList();
  sink.write("\n");
  sink.write(`Use '${PROGRAM_NAME} help <command>' for more information on a command.\n`);
}

/**
 * Usage lines, summary and description of one command.
 */
export function writeCommandHelp(
  cmd: CommandDescriptor,
  unit: CommandDeclaration,
  sink: TextSink,
): void {
  const [first, ...others] = unit.usage.length > 0 ? unit.usage : [""];
  const prefix = `usage: ${PROGRAM_NAME} ${cmd.name}`;
  sink.write(`${prefix}${first ? ` ${first}` : ""}\n`);
  for (const line of others) {
    sink.write(`   or: ${PROGRAM_NAME} ${cmd.name} ${line}\n`);
  }
  sink.write("\n");
  sink.write(`${cmd.help}\n`);
  if (unit.description) {
    sink.write("\n");
    sink.write(`${unit.description.trimEnd()}\n`);
  }
}
