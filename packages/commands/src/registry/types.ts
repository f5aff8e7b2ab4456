/**
 * @patchpile/cli-commands/registry
 * Type definitions for the command registry
 */

import type { CliContext } from '@patchpile/cli-core';
import type { CommandKind } from './kinds';

export type CommandFlags = Record<string, string | boolean | undefined>;

export interface CommandContext extends CliContext {
  /** The table this invocation dispatched from. */
  commands: CommandTable;
  /** Resolve a module name from the table back to its unit. */
  loadCommand(module: string): Promise<CommandDeclaration>;
  /** Rebuild the table by discovery, bypassing the cache. */
  discoverCommands(): Promise<CommandTable>;
}

/** An exit code, nothing, or data for `--json` output. */
export type CommandResult = number | void | Record<string, unknown>;

export type CommandRun = (
  ctx: CommandContext,
  argv: string[],
  flags: CommandFlags,
) => Promise<CommandResult> | CommandResult;

/**
 * What a command module declares.
 * The `usage` marker tells a command module apart from a helper file.
 */
export interface CommandUnit {
  usage: string[];
  /** Command name; the module name when omitted. */
  name?: string;
  kind: CommandKind;
  /** One-line summary for listings. */
  help: string;
  description?: string;
  run: CommandRun;
}

/**
 * A unit as loaded at run time, before its kind key has been checked
 * against the catalog.
 */
export type CommandDeclaration = Omit<CommandUnit, 'kind'> & { kind: string };

export interface LoadedCommand {
  module: string;
  unit: CommandDeclaration;
}

/** Lazy, ordered sequence of loaded command modules. */
export type CommandSource = AsyncIterable<LoadedCommand>;

/** Static registration of shipped command modules. */
export type ModuleRegistry = Readonly<Record<string, () => Promise<{ default: CommandUnit }>>>;

export interface CommandDescriptor {
  readonly name: string;
  readonly module: string;
  readonly kind: CommandKind;
  readonly help: string;
}

export type CommandTable = ReadonlyMap<string, CommandDescriptor>;
