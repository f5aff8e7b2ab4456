export const CLI_ERROR_CODES = {
  E_IO_READ: "E_IO_READ",
  E_IO_WRITE: "E_IO_WRITE",
  E_CONFIG: "E_CONFIG",
  E_INVALID_FLAGS: "E_INVALID_FLAGS",
  E_COMMAND_LOAD: "E_COMMAND_LOAD",
  E_COMMAND_INVALID: "E_COMMAND_INVALID",
  E_UNKNOWN_KIND: "E_UNKNOWN_KIND",
  E_DUPLICATE_COMMAND: "E_DUPLICATE_COMMAND",
  E_CACHE_INVALID: "E_CACHE_INVALID",
  E_EMPTY_COMMAND_SET: "E_EMPTY_COMMAND_SET",
  E_UNKNOWN_COMMAND: "E_UNKNOWN_COMMAND",
  E_AMBIGUOUS_COMMAND: "E_AMBIGUOUS_COMMAND",
} as const;

export type CliErrorCode = typeof CLI_ERROR_CODES[keyof typeof CLI_ERROR_CODES];

export const EXIT_CODES = {
  GENERIC: 1,      // generic runtime error
  USAGE: 64,       // EX_USAGE per sysexits.h
  SOFTWARE: 70,    // EX_SOFTWARE per sysexits.h
  IO: 74,          // EX_IOERR per sysexits.h
  CONFIG: 78,      // EX_CONFIG per sysexits.h
} as const;

const ERROR_CODE_SET: ReadonlySet<string> = new Set<string>(
  Object.values(CLI_ERROR_CODES),
);

export const mapCliErrorToExitCode = (code: CliErrorCode): number => {
  switch (code) {
    case CLI_ERROR_CODES.E_CONFIG:
      return EXIT_CODES.CONFIG;

    case CLI_ERROR_CODES.E_IO_READ:
    case CLI_ERROR_CODES.E_IO_WRITE:
      return EXIT_CODES.IO;

    case CLI_ERROR_CODES.E_INVALID_FLAGS:
    case CLI_ERROR_CODES.E_UNKNOWN_COMMAND:
    case CLI_ERROR_CODES.E_AMBIGUOUS_COMMAND:
      return EXIT_CODES.USAGE;

    // a command module that cannot be loaded or declared itself wrongly is a
    // packaging defect, as is a stale or hand-edited command cache
    case CLI_ERROR_CODES.E_COMMAND_LOAD:
    case CLI_ERROR_CODES.E_COMMAND_INVALID:
    case CLI_ERROR_CODES.E_UNKNOWN_KIND:
    case CLI_ERROR_CODES.E_DUPLICATE_COMMAND:
    case CLI_ERROR_CODES.E_CACHE_INVALID:
    case CLI_ERROR_CODES.E_EMPTY_COMMAND_SET:
      return EXIT_CODES.SOFTWARE;

    default:
      return EXIT_CODES.GENERIC;
  }
};

export class CliError extends Error {
  code: CliErrorCode;
  details?: unknown;

  constructor(code: CliErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CliError";
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliError);
    }
  }
}

export function isCliErrorCode(value: unknown): value is CliErrorCode {
  return typeof value === "string" && ERROR_CODE_SET.has(value);
}

export function isCliError(err: unknown): err is CliError {
  if (err instanceof CliError) return true;
  if (!err || typeof err !== "object") return false;
  return "code" in err && isCliErrorCode(err.code);
}

export interface SerializedCliError {
  name: string;
  message: string;
  code?: string;
  details?: unknown;
  stack?: string;
}

export function serializeCliError(
  err: unknown,
  opts: { includeStack?: boolean } = {},
): SerializedCliError {
  const includeStack = !!opts.includeStack;
  if (isCliError(err)) {
    return {
      name: "CliError",
      message: err.message,
      code: err.code,
      ...(err.details !== undefined ? { details: err.details } : {}),
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    };
  }
  if (err instanceof Error) {
    return {
      name: err.name || "Error",
      message: err.message,
      ...(includeStack && err.stack ? { stack: err.stack } : {}),
    };
  }
  return { name: "Error", message: String(err) };
}

/** Node's errno code of a filesystem error, if it has one. */
export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
