/**
 * @patchpile/cli-commands/registry
 * Find a command by its full name or an unambiguous prefix
 */

import { CliError, CLI_ERROR_CODES } from '@patchpile/cli-core';
import type { CommandDescriptor, CommandTable } from './types';
import { compareNames } from './table';

export function findCommand(table: CommandTable, word: string): CommandDescriptor {
  const exact = table.get(word);
  if (exact) {
    return exact;
  }

  const candidates = [...table.keys()]
    .filter((name) => word.length > 0 && name.startsWith(word))
    .sort(compareNames);

  const [only] = candidates;
  if (candidates.length === 1 && only !== undefined) {
    const match = table.get(only);
    if (match) {
      return match;
    }
  }

  if (candidates.length > 1) {
    throw new CliError(
      CLI_ERROR_CODES.E_AMBIGUOUS_COMMAND,
      `Ambiguous command: ${word} (could be ${candidates.join(', ')})`,
      { word, candidates },
    );
  }

  throw new CliError(
    CLI_ERROR_CODES.E_UNKNOWN_COMMAND,
    `Unknown command: ${word || '(none)'}`,
    { word },
  );
}
