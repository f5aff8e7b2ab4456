import { CliError, CLI_ERROR_CODES } from "./errors";
import type { LogLevel } from "./logger";

export type GlobalFlags = {
  json?: boolean;
  logLevel?: LogLevel;
  noCache?: boolean;
  config?: string;
  verbose?: boolean;
  debug?: boolean;
  help?: boolean;
  version?: boolean;
  quiet?: boolean;
};

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function takeValue(args: string[], flag: string): string {
  const value = args.shift();
  if (value === undefined || value.startsWith("-")) {
    throw new CliError(
      CLI_ERROR_CODES.E_INVALID_FLAGS,
      `Flag ${flag} requires a value`,
    );
  }
  return value;
}

export function parseArgs(argv: string[]): {
  cmdPath: string[];
  rest: string[];
  global: GlobalFlags;
  flagsObj: Record<string, string | boolean>;
} {
  const args = [...argv];
  const global: GlobalFlags = {};
  const flagsObj: Record<string, string | boolean> = {};
  const cmdPath: string[] = [];
  const rest: string[] = [];

  while (args.length) {
    const a = args.shift();
    if (a === undefined) {
      break;
    }
    if (a === "--") {
      rest.push(...args);
      break;
    }
    if (a.startsWith("-") && a !== "-") {
      switch (a) {
        case "--json":
          global.json = true;
          break;
        case "-h":
        case "--help":
          global.help = true;
          break;
        case "--version":
          global.version = true;
          break;
        case "--no-cache":
          global.noCache = true;
          break;
        case "--quiet":
          global.quiet = true;
          break;
        case "--debug":
          global.debug = true;
          global.logLevel = "debug";
          break;
        case "--verbose":
          global.verbose = true;
          global.logLevel = "debug";
          break;
        case "--log-level": {
          const level = takeValue(args, a);
          if (!isLogLevel(level)) {
            throw new CliError(
              CLI_ERROR_CODES.E_INVALID_FLAGS,
              `Invalid value for --log-level: ${level}. Must be one of: ${LOG_LEVELS.join(", ")}`,
            );
          }
          global.logLevel = level;
          break;
        }
        case "--config":
          global.config = takeValue(args, a);
          break;
        default: {
          // --flag=value, --flag value, or a bare boolean --flag
          const stripped = a.replace(/^--?/, "");

          if (stripped.includes("=")) {
            const [key, ...valueParts] = stripped.split("=");
            if (key) {
              flagsObj[key] = valueParts.join("=");
            }
          } else {
            const maybe = args[0];
            // a lone "-" is a value (stdout), not another flag
            if (maybe === undefined || (maybe.startsWith("-") && maybe !== "-")) {
              flagsObj[stripped] = true;
            } else {
              flagsObj[stripped] = maybe;
              args.shift();
            }
          }
        }
      }
    } else if (cmdPath.length === 0) {
      cmdPath.push(a);
    } else {
      rest.push(a);
    }
  }
  return { cmdPath, rest, global, flagsObj };
}
