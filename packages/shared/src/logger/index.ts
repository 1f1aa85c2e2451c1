/**
 * Logger for parser diagnostics. Writes to stderr so it never mixes with a
 * CLI's own output; LOG_LEVEL filters, LOG_FORMAT=json switches to JSON lines.
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
  /** Name of the flag set doing the logging. */
  program?: string;
}

type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  child(name: string): Logger;
  setContext(ctx: LogContext): void;
  /** Start a timer; the returned function logs `<label> completed` at debug and returns the ms elapsed. */
  time(label: string): () => number;
}

interface LogRecord {
  level: LogLevel;
  module: string;
  message: string;
  program?: string;
  data?: LogData;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const fromEnv = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function hasData(data: LogData | undefined): data is LogData {
  return data !== undefined && Object.keys(data).length > 0;
}

function formatJson(record: LogRecord, timestamp: string): string {
  const { level, module, message, program, data } = record;
  return JSON.stringify({
    timestamp,
    level,
    module,
    message,
    ...(program ? { program } : {}),
    ...(hasData(data) ? data : {}),
  });
}

function formatText(record: LogRecord, timestamp: string): string {
  const { level, module, message, program, data } = record;
  const scope = program ? `${program}:${module}` : module;
  const line = `[${timestamp}] [${level.toUpperCase()}] [${scope}] ${message}`;
  return hasData(data) ? `${line} ${JSON.stringify(data)}` : line;
}

export function createLogger(name: string, minLevel?: LogLevel, inherited: LogContext = {}): Logger {
  const level = resolveMinLevel(minLevel);
  const format = process.env.LOG_FORMAT?.toLowerCase() === "json" ? formatJson : formatText;
  let context: LogContext = { ...inherited };

  function log(recordLevel: LogLevel, message: string, data?: LogData): void {
    if (LEVEL_PRIORITY[recordLevel] < LEVEL_PRIORITY[level]) return;
    const record: LogRecord = { level: recordLevel, module: name, message, program: context.program, data };
    console.error(format(record, new Date().toISOString()));
  }

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
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
