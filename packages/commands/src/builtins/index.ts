import type { ModuleRegistry } from "../registry/types";

/**
 * Commands shipped with the CLI, by module name. Loaded on demand, so a
 * cached command table never imports the ones that are not run.
 */
export const BUILTIN_COMMANDS = {
  cmdlist: () => import("../commands/cmdlist"),
  doclist: () => import("../commands/doclist"),
  help: () => import("../commands/help"),
  version: () => import("../commands/version"),
} satisfies ModuleRegistry;
