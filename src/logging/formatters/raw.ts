/**
 * Raw Formatter - Minimal output with message content only
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as minimal raw output.
 *
 * @example
 * [set] api_key: written
 */
export class RawFormatter implements LogFormatter {
  private includeTimestamp: boolean;

  constructor(options?: { includeTimestamp?: boolean }) {
    this.includeTimestamp = options?.includeTimestamp ?? false;
  }

  format(entry: LogEntry): string {
    const { timestamp, event } = entry;

    const parts: string[] = [];

    if (this.includeTimestamp) {
      parts.push(`[${timestamp.toISOString()}]`);
    }

    parts.push(`[${event.operation}]`);
    if (event.variable !== undefined) {
      parts.push(`${event.variable}:`);
    }
    parts.push(event.outcome);

    return parts.join(' ');
  }
}
