/**
 * Logstash Formatter - JSON with @version/@timestamp for ELK stack
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as Logstash-compatible JSON for ELK stack integration.
 *
 * @example
 * {"@timestamp":"2026-01-22T10:30:00.000Z","@version":"1","level":"info","operation":"set","storage_key":"API_KEY"}
 */
export class LogstashFormatter implements LogFormatter {
  private version: string;

  constructor(options?: { version?: string }) {
    this.version = options?.version ?? '1';
  }

  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, event } = entry;

    const obj: Record<string, unknown> = {
      '@timestamp': timestamp.toISOString(),
      '@version': this.version,
      level,
      pid,
      progname,
      operation: event.operation,
      variable: event.variable,
      storage_key: event.storageKey,
      source: event.source,
      outcome: event.outcome,
      violations: event.violations,
    };

    return JSON.stringify(obj);
  }
}
