import type { LogLevel } from "./types.js";

export interface LogContext {
  traceId?: string;
  pr?: string;
  op?: string;
  caller?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  child(ctx: LogContext): Logger;
}

/** Receives one serialized JSON line per entry. */
export type LogWriter = (level: LogLevel, line: string) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

const processWriter: LogWriter = (level, line) => {
  if (level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
};

export function createLogger(baseCtx: LogContext = {}, minLevel: LogLevel = "info", write: LogWriter = processWriter): Logger {
  const minPriority = LEVEL_PRIORITY[minLevel];

  function emit(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const entry: Record<string, unknown> = {
      level,
      ts: new Date().toISOString(),
      msg,
      ...baseCtx,
      ...ctx,
    };

    // Remove undefined values for cleaner output
    for (const key of Object.keys(entry)) {
      if (entry[key] === undefined) delete entry[key];
    }

    write(level, JSON.stringify(entry));
  }

  return {
    debug: (msg, ctx) => emit("debug", msg, ctx),
    info: (msg, ctx) => emit("info", msg, ctx),
    warn: (msg, ctx) => emit("warn", msg, ctx),
    error: (msg, ctx) => emit("error", msg, ctx),
    child(ctx: LogContext): Logger {
      return createLogger({ ...baseCtx, ...ctx }, minLevel, write);
    },
  };
}

export function createRootLogger(minLevel?: LogLevel): Logger {
  const fromEnv = process.env.LOG_LEVEL;
  return createLogger({}, minLevel ?? (fromEnv && isLogLevel(fromEnv) ? fromEnv : "info"));
}

/** Logger that drops everything. For embedding callers that log elsewhere, and tests. */
export const silentLogger: Logger = createLogger({}, "error", () => {});
