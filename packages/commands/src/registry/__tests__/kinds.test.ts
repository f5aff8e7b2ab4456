import { describe, it, expect } from 'vitest';
import { CliError, CLI_ERROR_CODES } from '@patchpile/cli-core';
import {
  KIND_CATALOG,
  KIND_ORDER,
  isCommandKind,
  kindFromLabel,
  kindLabel,
  toCommandKind,
} from '../kinds';

describe('kind catalog', () => {
  it('lists kinds in display order', () => {
    expect(KIND_ORDER).toEqual(['repo', 'stack', 'patch', 'wc', 'alias']);
  });

  it('maps keys to labels and back', () => {
    for (const { kind, label } of KIND_CATALOG) {
      expect(kindLabel(kind)).toBe(label);
      expect(kindFromLabel(label)).toBe(kind);
    }
    expect(kindLabel('wc')).toBe('Index/worktree commands');
  });

  it('recognises only catalog keys', () => {
    expect(isCommandKind('patch')).toBe(true);
    expect(isCommandKind('Patch commands')).toBe(false);
    expect(kindFromLabel('patch')).toBeUndefined();
  });

  it('rejects an unknown kind key', () => {
    expect(() => toCommandKind('bogus', 'command module odd')).toThrow(CliError);
    expect(() => toCommandKind('bogus', 'command module odd')).toThrow(
      'Unknown command kind "bogus" declared by command module odd; expected one of: repo, stack, patch, wc, alias',
    );
  });

  it('tags unknown kinds with E_UNKNOWN_KIND', () => {
    let caught: unknown;
    try {
      toCommandKind('misc');
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ code: CLI_ERROR_CODES.E_UNKNOWN_KIND, details: { kind: 'misc' } });
  });
});
