/**
 * @patchpile/cli-commands/registry
 * Build the command table from a discovery source
 */

import { CliError, CLI_ERROR_CODES } from '@patchpile/cli-core';
import { toCommandKind } from './kinds';
import type { CommandDescriptor, CommandSource, CommandTable } from './types';

/**
 * Name is the unit's explicit `name`, else its module name. Any unit with an
 * unknown kind fails the whole build, as does a name claimed twice. Module
 * names must be unique too: dispatch resolves a command through its module.
 */
export async function buildCommandTable(source: CommandSource): Promise<CommandTable> {
  const table = new Map<string, CommandDescriptor>();
  const nameByModule = new Map<string, string>();

  for await (const { module, unit } of source) {
    const name = unit.name ?? module;
    const kind = toCommandKind(unit.kind, `command module ${module}`);

    const claimedBy = nameByModule.get(module);
    if (claimedBy !== undefined) {
      throw new CliError(
        CLI_ERROR_CODES.E_DUPLICATE_COMMAND,
        `Command module "${module}" is provided twice (commands "${claimedBy}" and "${name}")`,
        { module, names: [claimedBy, name] },
      );
    }
    nameByModule.set(module, name);

    const existing = table.get(name);
    if (existing) {
      throw new CliError(
        CLI_ERROR_CODES.E_DUPLICATE_COMMAND,
        `Command "${name}" is declared by both ${existing.module} and ${module}`,
        { name, modules: [existing.module, module] },
      );
    }

    table.set(name, Object.freeze({ name, module, kind, help: unit.help }));
  }

  return table;
}

/** Descriptors ordered by name, by code unit. */
export function sortedDescriptors(table: CommandTable): CommandDescriptor[] {
  return [...table.values()].sort((a, b) => compareNames(a.name, b.name));
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
