/**
 * Logging Utility
 *
 * Leveled, scoped logger with console output and pluggable sinks.
 * Sinks receive structured entries; the file sink writes one line per entry.
 *
 * @module @clipfilter/core/observability/logger
 */

import { appendFileSync } from 'node:fs';
import { getEnv } from '../runtime/env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Fields that are redacted in logged data
 */
const SENSITIVE_FIELDS = ['apikey', 'api_key', 'authorization', 'x-api-key', 'secret', 'password', 'token'];

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
  error?: { name: string; message: string; stack?: string };
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum level to emit (default: CLIPFILTER_LOG_LEVEL or 'info') */
  level?: LogLevel;
  /** Scope shown in brackets after the level */
  scope?: string;
  /** Write to the console (default: true) */
  console?: boolean;
  sinks?: LogSink[];
}

/**
 * Parse a log level name; unknown names yield undefined
 */
export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (!raw) return undefined;
  const lower = raw.trim().toLowerCase();
  return lower === 'debug' || lower === 'info' || lower === 'warn' || lower === 'error'
    ? lower
    : undefined;
}

/**
 * Redact sensitive fields for safe logging
 *
 * Header pairs (`[name, value]`) whose name is sensitive are redacted as well.
 */
export function redactSensitive(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (Array.isArray(value)) {
    if (value.length === 2 && typeof value[0] === 'string' && isSensitiveKey(value[0])) {
      return [value[0], redactValue(value[1])];
    }
    return value.map(item => redactSensitive(item));
  }

  if (typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key) ? redactValue(child) : redactSensitive(child);
    }
    return sanitized;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_FIELDS.some(field => lower.includes(field));
}

function redactValue(value: unknown): string {
  return typeof value === 'string' ? `[REDACTED ${value.length} chars]` : '[REDACTED]';
}

/**
 * Logger with console output and structured sinks
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly scope?: string;
  private readonly toConsole: boolean;
  private readonly sinks: LogSink[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(getEnv('CLIPFILTER_LOG_LEVEL')) ?? 'info';
    this.scope = options.scope;
    this.toConsole = options.console ?? true;
    this.sinks = options.sinks ?? [];
  }

  /**
   * Logger sharing level and sinks, with a nested scope
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      console: this.toConsole,
      sinks: this.sinks,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: Error | unknown, data?: unknown): void {
    this.log('error', message, data, error instanceof Error ? error : undefined);
  }

  private log(level: LogLevel, message: string, data?: unknown, error?: Error): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      scope: this.scope,
      message,
      data: data === undefined ? undefined : redactSensitive(data),
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
    };

    if (this.toConsole) {
      const consoleMethod = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      const prefix = entry.scope
        ? `[${level.toUpperCase()}] [${entry.scope}] ${message}`
        : `[${level.toUpperCase()}] ${message}`;
      const extras: unknown[] = [];
      if (entry.data !== undefined) extras.push(entry.data);
      if (error) extras.push(error);
      consoleMethod(prefix, ...extras);
    }

    for (const sink of this.sinks) {
      try {
        sink(entry);
      } catch (sinkError) {
        console.error('[clipfilter] log sink failed:', sinkError);
      }
    }
  }
}

/**
 * Format an entry as a single log line
 */
export function formatLogLine(entry: LogEntry): string {
  const parts = [new Date(entry.timestamp).toISOString(), entry.level.toUpperCase()];
  if (entry.scope) parts.push(`[${entry.scope}]`);
  parts.push(entry.message);
  if (entry.data !== undefined) parts.push(JSON.stringify(entry.data));
  if (entry.error) parts.push(`${entry.error.name}: ${entry.error.message}`);
  return parts.join(' ');
}

/**
 * Sink appending one line per entry to a UTF-8 log file
 */
export function createFileSink(path: string): LogSink {
  return (entry) => {
    appendFileSync(path, formatLogLine(entry) + '\n', 'utf8');
  };
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * Logger that discards everything (for tests and embedding)
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false, level: 'error', sinks: [] });
}
