/**
 * envar-registry Logging
 *
 * Structured logging with pluggable formatters.
 */

export {
  Logger,
  createLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type RegistryEvent,
  type Operation,
  type Outcome,
} from './logger.js';

export {
  type LogFormatter,
  LineFormatter,
  JsonFormatter,
  KeyValueFormatter,
  LogstashFormatter,
  RawFormatter,
} from './formatters/index.js';
