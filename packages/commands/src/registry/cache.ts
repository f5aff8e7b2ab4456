/**
 * @patchpile/cli-commands/registry
 * Precomputed command table, so an invocation need not load every command module
 *
 * Format (one command per line, sorted by name):
 *
 *   {
 *     "version": 1,
 *     "commands": {
 *       "help": ["help", "Repository commands", "Print help for a command or list all commands"]
 *     }
 *   }
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  CliError,
  CLI_ERROR_CODES,
  createBufferSink,
  errnoCode,
  getLogger,
  type TextSink,
} from '@patchpile/cli-core';
import { kindFromLabel, kindLabel } from './kinds';
import { CACHE_FORMAT_VERSION, CommandCacheSchema, formatIssues } from './schema';
import { buildCommandTable, sortedDescriptors } from './table';
import type { CommandDescriptor, CommandSource, CommandTable } from './types';

const logger = getLogger('cache');

export const DEFAULT_CACHE_FILE = path.join('generated', 'command-list.json');

function findPackageRoot(startDir: string): string {
  let cur = startDir;
  while (true) {
    if (existsSync(path.join(cur, 'package.json'))) {
      return cur;
    }
    const parent = path.dirname(cur);
    if (parent === cur) {
      return startDir;
    }
    cur = parent;
  }
}

/** `generated/command-list.json` inside this package, from sources or dist alike. */
export function defaultCachePath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.join(findPackageRoot(here), DEFAULT_CACHE_FILE);
}

export function serializeCommandTable(table: CommandTable, sink: TextSink): void {
  const entries = sortedDescriptors(table);
  sink.write('{\n');
  sink.write(`  "version": ${CACHE_FORMAT_VERSION},\n`);
  sink.write('  "commands": {');
  entries.forEach((cmd, index) => {
    const tuple = [cmd.module, kindLabel(cmd.kind), cmd.help];
    sink.write(index === 0 ? '\n' : ',\n');
    sink.write(`    ${JSON.stringify(cmd.name)}: [${tuple.map((v) => JSON.stringify(v)).join(', ')}]`);
  });
  sink.write(entries.length > 0 ? '\n  }\n' : '}\n');
  sink.write('}\n');
}

export function formatCommandCache(table: CommandTable): string {
  const sink = createBufferSink();
  serializeCommandTable(table, sink);
  return sink.toString();
}

/**
 * @throws CliError E_CACHE_INVALID for anything that is not a cache this
 *   version wrote
 */
export function parseCommandCache(text: string, source = 'command cache'): CommandTable {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CliError(
      CLI_ERROR_CODES.E_CACHE_INVALID,
      `Malformed ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { source },
      { cause: error },
    );
  }

  const parsed = CommandCacheSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError(
      CLI_ERROR_CODES.E_CACHE_INVALID,
      `Invalid ${source}: ${formatIssues(parsed.error)}`,
      { source, issues: parsed.error.issues },
    );
  }

  const table = new Map<string, CommandDescriptor>();
  for (const [name, [module, label, help]] of Object.entries(parsed.data.commands)) {
    const kind = kindFromLabel(label);
    if (kind === undefined) {
      throw new CliError(
        CLI_ERROR_CODES.E_CACHE_INVALID,
        `Invalid ${source}: command "${name}" has unknown kind "${label}"`,
        { source, name, label },
      );
    }
    table.set(name, Object.freeze({ name, module, kind, help }));
  }
  return table;
}

/**
 * @returns the cached table, or undefined when no cache has been generated
 */
export async function loadCachedTable(file: string): Promise<CommandTable | undefined> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      logger.debug('No command cache, falling back to discovery', { file });
      return undefined;
    }
    throw new CliError(
      CLI_ERROR_CODES.E_IO_READ,
      `Cannot read command cache ${file}: ${error instanceof Error ? error.message : String(error)}`,
      { path: file },
      { cause: error },
    );
  }
  return parseCommandCache(text, `command cache ${file}`);
}

export async function writeCommandCache(table: CommandTable, file: string): Promise<void> {
  try {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, formatCommandCache(table), 'utf8');
  } catch (error) {
    throw new CliError(
      CLI_ERROR_CODES.E_IO_WRITE,
      `Cannot write command cache ${file}: ${error instanceof Error ? error.message : String(error)}`,
      { path: file },
      { cause: error },
    );
  }
  logger.info('Command cache written', { file, commands: table.size });
}

export interface GetCommandsOptions {
  source: CommandSource;
  allowCached?: boolean;
  cachePath?: string;
}

/**
 * Cache first; discovery when the cache has not been generated. A cache that
 * exists but cannot be used is an error, not a reason to rediscover.
 */
export async function getCommands({
  source,
  allowCached = true,
  cachePath = defaultCachePath(),
}: GetCommandsOptions): Promise<CommandTable> {
  if (allowCached) {
    const cached = await loadCachedTable(cachePath);
    if (cached) {
      logger.debug('Loaded command cache', { file: cachePath, commands: cached.size });
      return cached;
    }
  }
  return buildCommandTable(source);
}
