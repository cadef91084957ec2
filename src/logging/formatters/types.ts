/**
 * Log Formatter Types
 */

import type { LogEntry } from '../logger.js';

/**
 * Renders one registry event. The logger appends the newline.
 */
export interface LogFormatter {
  format(entry: LogEntry): string;
}
