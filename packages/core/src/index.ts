// Error handling
export {
  EXIT_CODES,
  CLI_ERROR_CODES,
  CliError,
  mapCliErrorToExitCode,
  isCliError,
  isCliErrorCode,
  serializeCliError,
  errnoCode,
} from "./errors";
export type { CliErrorCode, SerializedCliError } from "./errors";

// Flags
export { parseArgs } from "./flags";
export type { GlobalFlags } from "./flags";

// Logging
export { getLogger, getLogLevel, setLogLevel, createNoOpLogger, toLogger } from "./logger";
export type { Logger, LogLevel, LogContext } from "./logger";

// Configuration
export {
  loadConfig,
  parseConfig,
  detectRepoRoot,
  CONFIG_FILE_NAMES,
  DEFAULT_LINK_MACRO,
} from "./config";
export type { PileConfig, LoadConfigOptions } from "./config";

// Presenters
export type { Presenter, TextSink } from "./presenter/types";
export { createTextPresenter } from "./presenter/text";
export { createJsonPresenter } from "./presenter/json";
export { createBufferSink } from "./presenter/sink";
export type { BufferSink } from "./presenter/sink";

// Context
export { createContext } from "./context";
export type { CliContext, CreateContextOptions } from "./context";
