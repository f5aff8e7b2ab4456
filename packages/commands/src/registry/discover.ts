/**
 * @patchpile/cli-commands/registry
 * Command discovery - builtin registry and command directories
 */

import { existsSync } from 'node:fs';
import path from 'node:path';
import { glob } from 'glob';
import { CliError, CLI_ERROR_CODES, getLogger } from '@patchpile/cli-core';
import type { CommandDeclaration, CommandSource, LoadedCommand, ModuleRegistry } from './types';
import { formatIssues, hasUsageMarker, validateDeclaration } from './schema';
import { isImportTimeout, safeImport } from '../utils/safe-import';

const logger = getLogger('discovery');

export const COMMAND_FILE_SUFFIXES = ['.js', '.mjs', '.cjs'] as const;

export interface DirectorySourceOptions {
  suffixes?: readonly string[];
  /** Per-module import timeout. */
  timeoutMs?: number;
}

export interface CommandSourceOptions extends DirectorySourceOptions {
  builtins: ModuleRegistry;
  directories?: readonly string[];
}

/** `refresh.mjs` -> `refresh` */
export function moduleNameFromFile(file: string, suffixes: readonly string[] = COMMAND_FILE_SUFFIXES): string {
  const base = path.basename(file);
  const suffix = suffixes.find((s) => base.endsWith(s));
  return suffix ? base.slice(0, -suffix.length) : base;
}

/**
 * The unit a module exposes: its default export when that carries the
 * marker, otherwise the module namespace itself.
 */
export function pickCommandUnit(mod: unknown): unknown {
  if (typeof mod === 'object' && mod !== null && 'default' in mod && hasUsageMarker(mod.default)) {
    return mod.default;
  }
  return hasUsageMarker(mod) ? mod : undefined;
}

function toPosixPath(file: string): string {
  return file.split(path.sep).join('/');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Import one command file.
 * @returns the validated declaration, or undefined for helper modules
 * @throws CliError E_COMMAND_LOAD if the module cannot be imported,
 *   E_COMMAND_INVALID if it carries the marker but declares itself wrongly
 */
export async function importCommandFile(
  file: string,
  timeoutMs?: number,
): Promise<CommandDeclaration | undefined> {
  let loaded: unknown;
  try {
    loaded = await safeImport(file, timeoutMs);
  } catch (error) {
    throw new CliError(
      CLI_ERROR_CODES.E_COMMAND_LOAD,
      `Failed to load command module ${toPosixPath(file)}: ${describeError(error)}`,
      { path: toPosixPath(file), timedOut: isImportTimeout(error) },
      { cause: error },
    );
  }

  const candidate = pickCommandUnit(loaded);
  if (candidate === undefined) {
    return undefined;
  }

  const result = validateDeclaration(candidate);
  if (!result.success) {
    throw new CliError(
      CLI_ERROR_CODES.E_COMMAND_INVALID,
      `Invalid command module ${toPosixPath(file)}: ${formatIssues(result.error)}`,
      { path: toPosixPath(file), issues: result.error.issues },
    );
  }
  return result.data;
}

export async function listCommandFiles(
  dir: string,
  suffixes: readonly string[] = COMMAND_FILE_SUFFIXES,
): Promise<string[]> {
  const patterns = suffixes.map((suffix) => `*${suffix}`);
  const files = await glob(patterns, {
    cwd: dir,
    absolute: true,
    nodir: true,
    ignore: ['*.d.ts', '*.test.*', '*.spec.*'],
  });
  return files.sort();
}

/**
 * Shipped commands, from the static registry.
 */
export async function* builtinSource(builtins: ModuleRegistry): AsyncGenerator<LoadedCommand> {
  for (const [module, load] of Object.entries(builtins)) {
    let unit: CommandDeclaration;
    try {
      unit = (await load()).default;
    } catch (error) {
      throw new CliError(
        CLI_ERROR_CODES.E_COMMAND_LOAD,
        `Failed to load builtin command module ${module}: ${describeError(error)}`,
        { module },
        { cause: error },
      );
    }
    yield { module, unit };
  }
}

/**
 * Commands found in a directory, one module per file, in file-name order.
 * Files without the `usage` marker are helpers and are skipped.
 */
export async function* directorySource(
  dir: string,
  opts: DirectorySourceOptions = {},
): AsyncGenerator<LoadedCommand> {
  const suffixes = opts.suffixes ?? COMMAND_FILE_SUFFIXES;
  if (!existsSync(dir)) {
    logger.warn('Command directory not found', { dir });
    return;
  }

  const files = await listCommandFiles(dir, suffixes);
  logger.debug('Found command files', { dir, count: files.length });

  for (const file of files) {
    const unit = await importCommandFile(file, opts.timeoutMs);
    if (!unit) {
      logger.debug('Skipping module without usage marker', { file });
      continue;
    }
    yield { module: moduleNameFromFile(file, suffixes), unit };
  }
}

export async function* chainSources(...sources: CommandSource[]): AsyncGenerator<LoadedCommand> {
  for (const source of sources) {
    yield* source;
  }
}

/** Builtins first, then each command directory in order. */
export function createCommandSource(opts: CommandSourceOptions): CommandSource {
  const dirs = opts.directories ?? [];
  return chainSources(
    builtinSource(opts.builtins),
    ...dirs.map((dir) => directorySource(dir, opts)),
  );
}
