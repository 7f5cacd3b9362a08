// src/logger.ts
import { inspect } from "node:util";

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
  scope?: string;
  message: string;
  meta?: LogMeta;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  // receives every entry at or above minLevel
  sink?: LogSink;
  minLevel?: LogLevel;
  clock?: () => number;
}

export function levelAtOrAbove(desired: LogLevel, candidate: LogLevel) {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}

function echoSuppressed(): boolean {
  const raw = process.env.SNAPSHOT_MIRROR_DISABLE_LOG_ECHO?.trim().toLowerCase();
  if (!raw) return false;
  return raw !== "0" && raw !== "false";
}

function serializeMeta(meta: LogMeta): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export function formatEntry(entry: LogEntry): string {
  const glyph =
    entry.level === "error"
      ? "⛔"
      : entry.level === "warn"
        ? "⚠️"
        : entry.level === "info"
          ? "ℹ️"
          : "·";
  const scope = entry.scope ? `[${entry.scope}] ` : "";
  const meta = entry.meta ? ` ${serializeMeta(entry.meta)}` : "";
  return `${glyph} ${scope}${entry.message}${meta}`;
}

export const stderrSink: LogSink = (entry) => {
  if (echoSuppressed()) return;
  console.error(formatEntry(entry));
};

export class StructuredLogger implements Logger {
  private readonly scope?: string;
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly clock: () => number;

  constructor({ scope, sink, minLevel, clock }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? stderrSink;
    this.minLevel = minLevel ?? "info";
    this.clock = clock ?? Date.now;
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      minLevel: this.minLevel,
      clock: this.clock,
    });
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isLevelEnabled(level)) return;
    this.sink({
      ts: this.clock(),
      level,
      scope: this.scope,
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

  isLevelEnabled(level: LogLevel): boolean {
    return levelAtOrAbove(this.minLevel, level);
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ minLevel, sink: stderrSink });
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
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

export function scopedLogger(logger: Logger | undefined, scope: string): Logger {
  if (!logger) return new NullLogger();
  return logger.child(scope);
}
