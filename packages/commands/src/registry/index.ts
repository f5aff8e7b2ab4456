/**
 * @patchpile/cli-commands/registry
 * Command discovery, table building, caching and lookup
 */

export * from './types';
export * from './kinds';
export * from './discover';
export * from './table';
export * from './cache';
export * from './loader';
export * from './lookup';
export {
  CommandDeclarationSchema,
  CommandCacheSchema,
  CACHE_FORMAT_VERSION,
  hasUsageMarker,
  validateDeclaration,
  type CommandCacheFile,
} from './schema';
