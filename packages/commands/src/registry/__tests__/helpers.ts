import { fileURLToPath } from 'node:url';
import type { CommandKind } from '../kinds';
import type {
  CommandDeclaration,
  CommandDescriptor,
  CommandTable,
  LoadedCommand,
} from '../types';

export function fixtureDir(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function unit(kind: string, help: string, extra: Partial<CommandDeclaration> = {}): CommandDeclaration {
  return { usage: [''], kind, help, run: () => 0, ...extra };
}

export async function* sourceOf(
  entries: Array<[module: string, unit: CommandDeclaration]>,
): AsyncGenerator<LoadedCommand> {
  for (const [module, u] of entries) {
    yield { module, unit: u };
  }
}

/** Table keyed by name, with module names equal to command names. */
export function tableOf(entries: Array<[name: string, kind: CommandKind, help: string]>): CommandTable {
  const table = new Map<string, CommandDescriptor>();
  for (const [name, kind, help] of entries) {
    table.set(name, { name, module: name, kind, help });
  }
  return table;
}
