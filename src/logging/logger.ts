/**
 * Structured Logger for envar-registry
 */

import type { LogFormatter } from './formatters/types.js';
import { LineFormatter } from './formatters/line.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Registry operations that produce log events
 */
export type Operation = 'declare' | 'get' | 'set' | 'validate';

/**
 * How an operation ended
 */
export type Outcome =
  | 'declared'
  | 'replaced'
  | 'resolved'
  | 'defaulted'
  | 'written'
  | 'denied'
  | 'invalid'
  | 'valid';

/**
 * One registry operation. Values are never carried; they may be secrets.
 */
export interface RegistryEvent {
  operation: Operation;
  outcome: Outcome;
  variable?: string;
  storageKey?: string;
  /** Which reader or writer handled the operation */
  source?: string;
  /** Number of violations, for validation outcomes */
  violations?: number;
}

/**
 * Log entry data
 */
export interface LogEntry {
  level: LogLevel;
  timestamp: Date;
  pid: number;
  progname: string;
  event: RegistryEvent;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Output stream (default: process.stdout) */
  output?: NodeJS.WritableStream;
  /** Log formatter (default: LineFormatter) */
  formatter?: LogFormatter;
  /** Program name (default: 'envar') */
  progname?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable/disable logging (default: true) */
  enabled?: boolean;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger for registry operations.
 */
export class Logger {
  private output: NodeJS.WritableStream;
  private formatter: LogFormatter;
  private progname: string;
  private level: LogLevel;
  private enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.formatter = options.formatter ?? new LineFormatter();
    this.progname = options.progname ?? 'envar';
    this.level = options.level ?? 'info';
    this.enabled = options.enabled ?? true;
  }

  /**
   * Log an event at the appropriate level
   */
  log(event: RegistryEvent, options?: { level?: LogLevel }): void {
    if (!this.enabled) return;

    const level = options?.level ?? this.inferLevel(event);
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      timestamp: new Date(),
      pid: process.pid,
      progname: this.progname,
      event,
    };

    const formatted = this.formatter.format(entry);
    this.output.write(formatted + '\n');
  }

  private inferLevel(event: RegistryEvent): LogLevel {
    if (event.outcome === 'denied' || event.outcome === 'invalid') return 'warn';
    if (event.outcome === 'written') return 'info';
    return 'debug';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  /**
   * Set the log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Set the formatter
   */
  setFormatter(formatter: LogFormatter): void {
    this.formatter = formatter;
  }

  /**
   * Enable logging
   */
  enable(): void {
    this.enabled = true;
  }

  /**
   * Disable logging
   */
  disable(): void {
    this.enabled = false;
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
