/**
 * KeyValue Formatter - key=value pairs for log parsing
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as key=value pairs, suitable for log parsing systems.
 *
 * @example
 * level=warn timestamp="2026-01-22T10:30:00.000Z" pid=3784 progname="envar" operation="set" variable="database_url" outcome="denied"
 */
export class KeyValueFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, event } = entry;

    const parts: string[] = [
      `level=${level}`,
      `timestamp="${timestamp.toISOString()}"`,
      `pid=${pid}`,
      `progname="${progname}"`,
    ];

    for (const [key, value] of Object.entries(event)) {
      if (value === undefined) continue;
      parts.push(`${toSnakeCase(key)}=${formatValue(value)}`);
    }

    return parts.join(' ');
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `"${escapeString(value)}"`;
  return String(value);
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function toSnakeCase(str: string): string {
  return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}
