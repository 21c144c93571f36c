import { inspect } from "node:util";
import { CLI_NAME } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  ts: number;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
}

export interface Logger {
  log(level: LogLevel, message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

function atLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/** Hands every entry at or above `minLevel` to `sink`. */
export class StructuredLogger implements Logger {
  constructor(
    private readonly sink: (entry: LogEntry) => void,
    private readonly minLevel: LogLevel = "debug",
  ) {}

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!atLeast(level, this.minLevel)) return;
    this.sink({
      ts: Date.now(),
      level,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }
}

export class NullLogger implements Logger {
  log(_level: LogLevel, _message: string, _meta?: LogMeta): void {}
  debug(_message: string, _meta?: LogMeta): void {}
  info(_message: string, _meta?: LogMeta): void {}
  warn(_message: string, _meta?: LogMeta): void {}
  error(_message: string, _meta?: LogMeta): void {}
}

function isEchoSuppressed(): boolean {
  const raw = process.env.DIRPLAN_DISABLE_LOG_ECHO;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value === "" || /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  if (typeof value === "number" || typeof value === "boolean" || value === null) {
    return String(value);
  }
  return inspect(value, { depth: 4, breakLength: Infinity });
}

/** `dirplan warn: skipping catalog catalog=/t/.dir.db error="..."` */
export function formatLogLine(entry: LogEntry): string {
  const fields = Object.entries(entry.meta ?? {}).map(
    ([key, value]) => `${key}=${formatValue(value)}`,
  );
  return [`${CLI_NAME} ${entry.level}:`, entry.message, ...fields].join(" ");
}

// stdout carries the command output (tables, plan summaries)
export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super((entry) => {
      if (!isEchoSuppressed()) console.error(formatLogLine(entry));
    }, minLevel);
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

/** Collects entries in memory; used by tests and by callers that want to inspect what a run reported. */
export function memoryLogger(minLevel: LogLevel = "debug"): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  return {
    logger: new StructuredLogger((entry) => entries.push(entry), minLevel),
    entries,
  };
}
