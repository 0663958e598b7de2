// File-based logging
// Buffered entries are appended to a log file in one of three line formats.
// Logging never throws into the caller: a log file that cannot be written is
// reported once on stderr and file output stops.

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { RasterConfig } from './config/mod.ts';

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export type LogFormat = 'json' | 'text' | 'structured';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: Error;
  source?: string;
}

export interface LoggerOptions {
  // Path to log file; empty disables file output
  logFile?: string;
  level?: LogLevel;
  format?: LogFormat;
  includeTimestamp?: boolean;
  includeLevel?: boolean;
  includeSource?: boolean;
  // Entries held before a write
  bufferSize?: number;
  // Periodic flush in milliseconds, 0 for none
  flushInterval?: number;
}

export interface LoggerStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  bufferSize: number;
  lastFlush: Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'text' || value === 'structured';
}

function hasContext(context: LogContext | undefined): context is LogContext {
  return context !== undefined && Object.keys(context).length > 0;
}

type LineOptions = Pick<Required<LoggerOptions>, 'includeTimestamp' | 'includeLevel' | 'includeSource'>;

function jsonLine(entry: LogEntry): string {
  const { error } = entry;
  return JSON.stringify({
    ...entry,
    timestamp: entry.timestamp.toISOString(),
    error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined,
  });
}

function textLine(entry: LogEntry, options: LineOptions): string {
  const parts: string[] = [];
  if (options.includeTimestamp) parts.push(`[${entry.timestamp.toISOString()}]`);
  if (options.includeLevel) parts.push(entry.level.padEnd(5));
  if (options.includeSource && entry.source) parts.push(`[${entry.source}]`);
  parts.push(entry.message);

  let line = parts.join(' ');
  if (hasContext(entry.context)) line += ` | ${JSON.stringify(entry.context)}`;
  if (entry.error) line += ` | ERROR: ${entry.error.message}`;
  return line;
}

function structuredLine(entry: LogEntry, options: LineOptions): string {
  let line = '';
  if (options.includeTimestamp) line += `${entry.timestamp.toISOString()} `;
  if (options.includeLevel) line += `[${entry.level}] `;
  if (options.includeSource && entry.source) line += `${entry.source}: `;
  line += entry.message;

  if (hasContext(entry.context)) {
    const pairs = Object.entries(entry.context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    line += ` | ${pairs.join(', ')}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) line += `\n  Stack: ${entry.error.stack}`;
  }
  return line;
}

function emptyLevelCounts(): Record<LogLevel, number> {
  return { TRACE: 0, DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 };
}

export class Logger {
  private _options: Required<LoggerOptions>;
  private _pending: LogEntry[] = [];
  private _stats: LoggerStats;
  private _timer?: ReturnType<typeof setInterval>;
  private _opened = false;
  private _failed = false;

  constructor(options: LoggerOptions = {}) {
    this._options = {
      logFile: options.logFile ?? '',
      level: options.level ?? 'INFO',
      format: options.format ?? 'structured',
      includeTimestamp: options.includeTimestamp ?? true,
      includeLevel: options.includeLevel ?? true,
      includeSource: options.includeSource ?? true,
      bufferSize: options.bufferSize ?? 100,
      flushInterval: options.flushInterval ?? 1000,
    };
    this._stats = {
      totalEntries: 0,
      entriesByLevel: emptyLevelCounts(),
      bufferSize: 0,
      lastFlush: new Date(),
    };
  }

  /**
   * True while entries are being written: a log file is set and writing it has not failed.
   */
  get enabled(): boolean {
    return !this._failed && this._options.logFile.trim() !== '';
  }

  /**
   * Create the log directory and start the periodic flush. Runs on the first entry.
   */
  initialize(): void {
    if (this._opened || !this.enabled) return;
    this._opened = true;

    try {
      mkdirSync(dirname(this._options.logFile), { recursive: true });
    } catch (error) {
      this._fail(error);
      return;
    }

    if (this._options.flushInterval > 0) {
      this._timer = setInterval(() => this.flush(), this._options.flushInterval);
      this._timer.unref();
    }
  }

  formatEntry(entry: LogEntry): string {
    switch (this._options.format) {
      case 'json':
        return jsonLine(entry) + '\n';
      case 'text':
        return textLine(entry, this._options) + '\n';
      case 'structured':
      default:
        return structuredLine(entry, this._options) + '\n';
    }
  }

  trace(message: string, context?: LogContext, source?: string): void {
    this._record('TRACE', message, context, source);
  }

  debug(message: string, context?: LogContext, source?: string): void {
    this._record('DEBUG', message, context, source);
  }

  info(message: string, context?: LogContext, source?: string): void {
    this._record('INFO', message, context, source);
  }

  warn(message: string, context?: LogContext, source?: string): void {
    this._record('WARN', message, context, source);
  }

  error(message: string, error?: Error, context?: LogContext, source?: string): void {
    this._record('ERROR', message, context, source, error);
  }

  fatal(message: string, error?: Error, context?: LogContext, source?: string): void {
    this._record('FATAL', message, context, source, error);
  }

  /**
   * Append buffered entries to the log file.
   */
  flush(): void {
    if (this._pending.length === 0 || !this.enabled) return;

    const content = this._pending.map(entry => this.formatEntry(entry)).join('');
    try {
      appendFileSync(this._options.logFile, content);
    } catch (error) {
      this._fail(error);
      return;
    }
    this._pending = [];
    this._stats.bufferSize = 0;
    this._stats.lastFlush = new Date();
  }

  setLevel(level: LogLevel): void {
    this._options.level = level;
  }

  getStats(): LoggerStats {
    return { ...this._stats, entriesByLevel: { ...this._stats.entriesByLevel } };
  }

  close(): void {
    this._stopTimer();
    this.flush();
  }

  private _record(level: LogLevel, message: string, context?: LogContext, source?: string, error?: Error): void {
    if (!this.enabled || LEVEL_ORDER[level] < LEVEL_ORDER[this._options.level]) return;

    this.initialize();
    if (!this.enabled) return;

    this._pending.push({ timestamp: new Date(), level, message, context, source, error });
    this._stats.totalEntries++;
    this._stats.entriesByLevel[level]++;
    this._stats.bufferSize = this._pending.length;

    if (this._pending.length >= this._options.bufferSize) {
      this.flush();
    }
  }

  private _fail(error: unknown): void {
    this._failed = true;
    this._stopTimer();
    this._pending = [];
    this._stats.bufferSize = 0;
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Failed to write to log file "${this._options.logFile}": ${message}`);
  }

  private _stopTimer(): void {
    if (this._timer) {
      clearInterval(this._timer);
      this._timer = undefined;
    }
  }
}

function createDefaultLoggerOptions(): LoggerOptions {
  const config = RasterConfig.get();
  const level = config.logLevel;
  const format = config.logFormat;

  return {
    level: isLogLevel(level) ? level : 'INFO',
    logFile: config.logFile,
    format: isLogFormat(format) ? format : 'structured',
  };
}

let globalLogger: Logger | undefined;

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger({ ...createDefaultLoggerOptions(), ...options });
}

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(createDefaultLoggerOptions());
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger | undefined): void {
  globalLogger = logger;
}

// Logger bound to a component name, used as the entry source
export interface ComponentLogger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  fatal(message: string, error?: Error, context?: LogContext): void;
}

// Resolves the global logger on every call, so loggers taken at module load
// follow a later setGlobalLogger()
export function getLogger(name: string): ComponentLogger {
  return {
    trace: (message, context) => getGlobalLogger().trace(message, context, name),
    debug: (message, context) => getGlobalLogger().debug(message, context, name),
    info: (message, context) => getGlobalLogger().info(message, context, name),
    warn: (message, context) => getGlobalLogger().warn(message, context, name),
    error: (message, error, context) => getGlobalLogger().error(message, error, context, name),
    fatal: (message, error, context) => getGlobalLogger().fatal(message, error, context, name),
  };
}
