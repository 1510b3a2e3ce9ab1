/**
 * Structured logger writing to stderr.
 *
 * - Text lines by default, JSON lines when LOG_FORMAT=json
 * - Level filtering via LOG_LEVEL (debug | info | warn | error, default info)
 * - Child loggers inherit name and context
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  /** Program name of the command being compiled or run. */
  command?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string, ctx?: LogContext): Logger;
  /** Start a timer. The returned stop function logs the elapsed ms at debug level. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  context: LogContext = {},
): Logger {
  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    // Environment is read per call so tests and long-lived processes can flip it.
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[resolveMinLevel(minLevel)]) return;

    const timestamp = new Date().toISOString();
    const fields = { ...context, ...data };
    const hasFields = Object.keys(fields).length > 0;

    if (isJsonFormat()) {
      console.error(JSON.stringify({ timestamp, level, module: name, message, ...fields }));
      return;
    }

    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]`;
    console.error(hasFields ? `${prefix} ${message} ${JSON.stringify(fields)}` : `${prefix} ${message}`);
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName, ctx) =>
      createLogger(`${name}:${childName}`, minLevel, { ...context, ...ctx }),
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
