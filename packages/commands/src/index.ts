/**
 * @patchpile/cli-commands
 * Public surface: kind catalog, discovery, command table and its cache,
 * lookup, listings, builtin commands.
 * This package does not parse argv or decide exit codes.
 */
export * from "./registry";
export {
  groupCommands,
  writePrettyCommandList,
  writeMarkupCommandList,
  type CommandListEntry,
  type CommandListGroup,
  type MarkupListOptions,
} from "./presentation/command-list";
export {
  PROGRAM_NAME,
  writeGeneralHelp,
  writeCommandHelp,
} from "./presentation/command-help";
export { BUILTIN_COMMANDS } from "./builtins";
export { getVersion, CLI_VERSION } from "./commands/version";
