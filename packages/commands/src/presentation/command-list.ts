import {
  CliError,
  CLI_ERROR_CODES,
  DEFAULT_LINK_MACRO,
  type TextSink,
} from "@patchpile/cli-core";
import { KIND_CATALOG, type KindLabel } from "../registry/kinds";
import { sortedDescriptors } from "../registry/table";
import type { CommandTable } from "../registry/types";

export interface CommandListEntry {
  name: string;
  help: string;
}

export interface CommandListGroup {
  label: KindLabel;
  commands: CommandListEntry[];
}

/**
 * Commands grouped by kind, groups in catalog order, names sorted within
 * each group. Kinds without commands are left out.
 */
export function* groupCommands(table: CommandTable): Generator<CommandListGroup> {
  const sorted = sortedDescriptors(table);
  for (const { kind, label } of KIND_CATALOG) {
    const commands = sorted
      .filter((cmd) => cmd.kind === kind)
      .map((cmd) => ({ name: cmd.name, help: cmd.help }));
    if (commands.length > 0) {
      yield { label, commands };
    }
  }
}

/** Length in code points, so astral characters count once. */
function textWidth(text: string): number {
  return [...text].length;
}

function padEnd(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - textWidth(text)));
}

export function writePrettyCommandList(table: CommandTable, sink: TextSink): void {
  if (table.size === 0) {
    throw new CliError(CLI_ERROR_CODES.E_EMPTY_COMMAND_SET, "No commands to list");
  }
  // one width for every group, so all help texts line up
  const width = Math.max(...[...table.keys()].map(textWidth));

  let sep = "";
  for (const group of groupCommands(table)) {
    sink.write(sep);
    sep = "\n";
    sink.write(`${group.label}:\n`);
    for (const cmd of group.commands) {
      sink.write(`  ${padEnd(cmd.name, width)}  ${cmd.help}\n`);
    }
  }
}

function writeUnderlined(text: string, underline: string, sink: TextSink): void {
  sink.write(`${text}\n`);
  sink.write(`${underline.repeat(textWidth(text))}\n`);
}

export interface MarkupListOptions {
  /** AsciiDoc macro used to cross-reference a command's manual page. */
  linkMacro?: string;
}

export function writeMarkupCommandList(
  table: CommandTable,
  sink: TextSink,
  opts: MarkupListOptions = {},
): void {
  const macro = opts.linkMacro ?? DEFAULT_LINK_MACRO;
  for (const group of groupCommands(table)) {
    writeUnderlined(group.label, "~", sink);
    sink.write("\n");
    for (const cmd of group.commands) {
      sink.write(`${macro}:${cmd.name}[]::\n`);
      sink.write(`    ${cmd.help}\n`);
    }
    sink.write("\n");
  }
}
