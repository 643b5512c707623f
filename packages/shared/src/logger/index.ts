/**
 * Structured logger written to stderr.
 *
 * LOG_FORMAT=json switches to one JSON object per line; LOG_LEVEL sets the
 * minimum level. Entries carry the parser id and pass number once set, so
 * registrations and the passes that read them can be matched up.
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
  parserId?: string;
  pass?: number;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Merge persistent context fields (parserId, pass). */
  setContext(ctx: LogContext): void;
  /** Start a timer. The returned function logs and returns the elapsed ms. */
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

/** `[p-1 #2]` in text output; empty when no parser context is set. */
function contextTag(context: LogContext): string {
  if (context.parserId === undefined) return "";
  const pass = context.pass === undefined ? "" : ` #${context.pass}`;
  return ` [${context.parserId}${pass}]`;
}

function hasData(data?: Record<string, unknown>): data is Record<string, unknown> {
  return data !== undefined && Object.keys(data).length > 0;
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  const level = resolveMinLevel(minLevel);
  const useJson = isJsonFormat();
  let context: LogContext = { ...parentContext };

  function format(entryLevel: LogLevel, message: string, data?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    if (useJson) {
      return JSON.stringify({
        timestamp,
        level: entryLevel,
        module: name,
        message,
        parser_id: context.parserId,
        pass: context.pass,
        ...data,
      });
    }
    const line = `[${timestamp}] [${entryLevel.toUpperCase()}] [${name}]${contextTag(context)} ${message}`;
    return hasData(data) ? `${line} ${JSON.stringify(data)}` : line;
  }

  function log(entryLevel: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[entryLevel] < LEVEL_PRIORITY[level]) return;
    console.error(format(entryLevel, message, data));
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, level, context),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
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
