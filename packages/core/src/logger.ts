import { pino, type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogContext): void;
  info(msg: string, meta?: LogContext): void;
  warn(msg: string, meta?: LogContext): void;
  error(msg: string, meta?: LogContext | Error): void;
  child(bindings: { category?: string; meta?: LogContext }): Logger;
}

export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.PATCHPILE_LOG_LEVEL ?? env.LOG_LEVEL ?? "warn").toLowerCase();
  switch (raw) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return raw;
    default:
      return "warn";
  }
}

let root: PinoLogger | undefined;

// stdout belongs to command output; diagnostics go to stderr
function rootLogger(): PinoLogger {
  if (!root) {
    root = pino(
      { name: "pile", level: getLogLevel(), base: undefined },
      pino.destination(2),
    );
  }
  return root;
}

export function setLogLevel(level: LogLevel): void {
  rootLogger().level = level;
}

export function toLogger(base: PinoLogger): Logger {
  return {
    debug: (msg, meta) => base.debug(meta ?? {}, msg),
    info: (msg, meta) => base.info(meta ?? {}, msg),
    warn: (msg, meta) => base.warn(meta ?? {}, msg),
    error: (msg, metaOrError) => {
      if (metaOrError instanceof Error) {
        base.error({ err: metaOrError }, msg);
        return;
      }
      base.error(metaOrError ?? {}, msg);
    },
    child: (bindings) => {
      const merged: LogContext = {};
      if (bindings.category) {
        merged.category = bindings.category;
      }
      if (bindings.meta) {
        Object.assign(merged, bindings.meta);
      }
      return toLogger(base.child(merged));
    },
  };
}

export function getLogger(category = "cli"): Logger {
  return toLogger(rootLogger().child({ layer: "cli", category }));
}

export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => createNoOpLogger(),
  };
}
