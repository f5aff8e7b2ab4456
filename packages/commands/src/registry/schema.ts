/**
 * @patchpile/cli-commands/registry
 * Zod schemas for command modules loaded at run time and for the command cache
 */

import { z } from 'zod';
import type { CommandDeclaration, CommandRun } from './types';

export const CommandDeclarationSchema = z.object({
  usage: z.array(z.string()),
  name: z
    .string()
    .min(1)
    .regex(/^[a-z0-9][a-z0-9-]*$/, 'Command name must be lowercase alphanumeric with hyphens')
    .optional(),
  kind: z.string().min(1),
  help: z.string().min(1).refine((help) => !help.includes('\n'), 'help must be a single line'),
  description: z.string().optional(),
  run: z.custom<CommandRun>((value) => typeof value === 'function', 'run must be a function'),
});

export const CACHE_FORMAT_VERSION = 1;

export const CommandCacheSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  commands: z.record(z.tuple([z.string().min(1), z.string().min(1), z.string()])),
});

export type CommandCacheFile = z.infer<typeof CommandCacheSchema>;

/**
 * Presence of `usage` marks a command module; anything else in a command
 * directory is a helper.
 */
export function hasUsageMarker(value: unknown): value is { usage: unknown } {
  return typeof value === 'object' && value !== null && 'usage' in value;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function validateDeclaration(
  value: unknown,
): { success: true; data: CommandDeclaration } | { success: false; error: z.ZodError } {
  const result = CommandDeclarationSchema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
