/**
 * JSON Formatter - Compact JSON log format
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as compact JSON.
 *
 * @example
 * {"level":"debug","timestamp":"2026-01-22T10:30:00.000Z","pid":3784,"progname":"envar","operation":"get","variable":"port","outcome":"resolved"}
 */
export class JsonFormatter implements LogFormatter {
  private pretty: boolean;

  constructor(options?: { pretty?: boolean }) {
    this.pretty = options?.pretty ?? false;
  }

  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, event } = entry;

    const obj: Record<string, unknown> = {
      level,
      timestamp: timestamp.toISOString(),
      pid,
      progname,
      ...event,
    };

    return JSON.stringify(obj, null, this.pretty ? 2 : undefined);
  }
}
