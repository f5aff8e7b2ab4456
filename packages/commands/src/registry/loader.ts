/**
 * @patchpile/cli-commands/registry
 * Resolve a module name from the command table back to its implementation
 */

import { existsSync } from 'node:fs';
import path from 'node:path';
import { CliError, CLI_ERROR_CODES } from '@patchpile/cli-core';
import type { CommandDeclaration } from './types';
import { COMMAND_FILE_SUFFIXES, importCommandFile, type CommandSourceOptions } from './discover';

export interface CommandLoader {
  load(module: string): Promise<CommandDeclaration>;
}

export function createCommandLoader(opts: CommandSourceOptions): CommandLoader {
  const suffixes = opts.suffixes ?? COMMAND_FILE_SUFFIXES;
  const dirs = opts.directories ?? [];

  return {
    async load(module) {
      if (Object.hasOwn(opts.builtins, module)) {
        const load = opts.builtins[module];
        if (load) {
          try {
            return (await load()).default;
          } catch (error) {
            throw new CliError(
              CLI_ERROR_CODES.E_COMMAND_LOAD,
              `Failed to load builtin command module ${module}: ${error instanceof Error ? error.message : String(error)}`,
              { module },
              { cause: error },
            );
          }
        }
      }

      for (const dir of dirs) {
        for (const suffix of suffixes) {
          const file = path.join(dir, `${module}${suffix}`);
          if (!existsSync(file)) {
            continue;
          }
          const unit = await importCommandFile(file, opts.timeoutMs);
          if (!unit) {
            throw new CliError(
              CLI_ERROR_CODES.E_COMMAND_INVALID,
              `Module ${file} is not a command (no usage marker)`,
              { module, path: file },
            );
          }
          return unit;
        }
      }

      throw new CliError(
        CLI_ERROR_CODES.E_COMMAND_LOAD,
        `No command module named "${module}"; the command cache may be stale (run "pile cmdlist")`,
        { module, directories: dirs },
      );
    },
  };
}
