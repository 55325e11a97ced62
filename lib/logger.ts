/**
 * Scoped console logging: `[scope] message { ctx }`.
 * Debug lines only in development or with LOG_LEVEL=debug.
 */

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (message: string, ctx?: LogContext) => void;
  info: (message: string, ctx?: LogContext) => void;
  warn: (message: string, ctx?: LogContext) => void;
  error: (message: string, ctx?: LogContext) => void;
};

function debugEnabled(): boolean {
  return process.env.NODE_ENV === "development" || process.env.LOG_LEVEL === "debug";
}

function infoEnabled(): boolean {
  const level = process.env.LOG_LEVEL;
  return level !== "warn" && level !== "error" && level !== "silent";
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const write = (sink: (...args: unknown[]) => void, message: string, ctx?: LogContext) => {
    if (ctx && Object.keys(ctx).length > 0) sink(prefix, message, ctx);
    else sink(prefix, message);
  };
  return {
    debug: (message, ctx) => {
      if (debugEnabled()) write(console.log, message, ctx);
    },
    info: (message, ctx) => {
      if (infoEnabled()) write(console.log, message, ctx);
    },
    warn: (message, ctx) => {
      if (process.env.LOG_LEVEL !== "error" && process.env.LOG_LEVEL !== "silent") write(console.warn, message, ctx);
    },
    error: (message, ctx) => {
      if (process.env.LOG_LEVEL !== "silent") write(console.error, message, ctx);
    },
  };
}
