/**
 * @patchpile/cli-commands/registry
 * Command kinds and their display order
 */

import { CliError, CLI_ERROR_CODES } from '@patchpile/cli-core';

/** Kind keys with their listing headings, in display order. */
export const KIND_CATALOG = [
  { kind: 'repo', label: 'Repository commands' },
  { kind: 'stack', label: 'Stack (branch) commands' },
  { kind: 'patch', label: 'Patch commands' },
  { kind: 'wc', label: 'Index/worktree commands' },
  { kind: 'alias', label: 'Alias commands' },
] as const;

export type CommandKind = (typeof KIND_CATALOG)[number]['kind'];
export type KindLabel = (typeof KIND_CATALOG)[number]['label'];

export const KIND_ORDER: readonly CommandKind[] = KIND_CATALOG.map((entry) => entry.kind);

const LABEL_BY_KIND: ReadonlyMap<string, KindLabel> = new Map(
  KIND_CATALOG.map((entry) => [entry.kind, entry.label]),
);
const KIND_BY_LABEL: ReadonlyMap<string, CommandKind> = new Map(
  KIND_CATALOG.map((entry) => [entry.label, entry.kind]),
);

export function isCommandKind(value: string): value is CommandKind {
  return LABEL_BY_KIND.has(value);
}

/**
 * Validate a declared kind key.
 * @throws CliError E_UNKNOWN_KIND when the key is not in the catalog
 */
export function toCommandKind(value: string, source?: string): CommandKind {
  if (!isCommandKind(value)) {
    throw new CliError(
      CLI_ERROR_CODES.E_UNKNOWN_KIND,
      `Unknown command kind "${value}"${source ? ` declared by ${source}` : ''}; expected one of: ${KIND_ORDER.join(', ')}`,
      { kind: value, source },
    );
  }
  return value;
}

export function kindLabel(kind: CommandKind): KindLabel {
  const label = LABEL_BY_KIND.get(kind);
  if (label === undefined) {
    throw new CliError(CLI_ERROR_CODES.E_UNKNOWN_KIND, `Unknown command kind "${kind}"`, { kind });
  }
  return label;
}

/** Reverse lookup used when reading the command cache. */
export function kindFromLabel(label: string): CommandKind | undefined {
  return KIND_BY_LABEL.get(label);
}
