/**
 * Line Formatter - Traditional single-line log format
 */

import type { LogEntry } from '../logger.js';
import type { LogFormatter } from './types.js';

/**
 * Formats log entries as traditional single-line format.
 *
 * @example
 * I, [2026-01-22T10:30:00.000Z #3784] INFO -- envar: operation="set" variable="api_key" storage_key="API_KEY" source="writer" outcome="written"
 */
export class LineFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const { level, timestamp, pid, progname, event } = entry;
    const levelChar = level.charAt(0).toUpperCase();
    const levelUpper = level.toUpperCase();
    const ts = timestamp.toISOString();

    const parts: string[] = [`operation="${event.operation}"`];

    if (event.variable !== undefined) {
      parts.push(`variable="${escapeString(event.variable)}"`);
    }

    if (event.storageKey !== undefined) {
      parts.push(`storage_key="${escapeString(event.storageKey)}"`);
    }

    if (event.source !== undefined) {
      parts.push(`source="${event.source}"`);
    }

    parts.push(`outcome="${event.outcome}"`);

    if (event.violations !== undefined) {
      parts.push(`violations=${event.violations}`);
    }

    const message = parts.join(' ');
    return `${levelChar}, [${ts} #${pid}] ${levelUpper} -- ${progname}: ${message}`;
  }
}

function escapeString(str: string): string {
  return str.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
