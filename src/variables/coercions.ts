/**
 * Type Coercions
 *
 * Converts raw backend values into typed values. Every coercion is total:
 * malformed numbers degrade to 0 and malformed collections to empty ones.
 * Absent raw values never get here; the registry substitutes the default.
 */

import { isPlainObject } from '../utils/types.js';
import type { TypeMap, VariableType } from './types.js';

/**
 * Coercion function type
 */
export type CoercionFunction<T> = (raw: unknown) => T;

const TRUTHY = ['true', '1', 'yes', 'on'];

const INTEGER_PREFIX = /^\s*[+-]?\d+(?:_\d+)*/;

/**
 * Text of a raw value. Symbols contribute their description.
 */
function textOf(raw: unknown): string {
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'symbol') return raw.description ?? '';
  return String(raw);
}

/**
 * Built-in coercions, one per variable type
 */
export const coercions: { readonly [K in VariableType]: CoercionFunction<TypeMap[K]> } = {
  /**
   * Coerce to string
   */
  string: (raw) => textOf(raw),

  /**
   * Coerce to integer (decimal prefix, 0 when there is none). Underscores
   * between digits are separators. Magnitudes above 2^53 lose precision.
   */
  integer: (raw) => {
    const prefix = INTEGER_PREFIX.exec(textOf(raw));
    return prefix ? parseInt(prefix[0].replace(/_/g, ''), 10) || 0 : 0;
  },

  /**
   * Coerce to float (decimal prefix, 0 when there is none)
   */
  float: (raw) => {
    const parsed = parseFloat(textOf(raw));
    return Number.isFinite(parsed) ? parsed : 0;
  },

  /**
   * Coerce to boolean
   */
  boolean: (raw) => TRUTHY.includes(textOf(raw).toLowerCase()),

  /**
   * Coerce to array: JSON array first, comma-separated list otherwise
   */
  array: (raw) => {
    if (Array.isArray(raw)) return raw;

    const text = textOf(raw);
    if (text === '') return [];

    const parsed = parseJson(text);
    if (Array.isArray(parsed)) return parsed;

    // Trailing empty segments go before trimming: 'a, ' keeps its blank entry
    const segments = text.split(',');
    while (segments.length > 0 && segments[segments.length - 1] === '') {
      segments.pop();
    }
    return segments.map((segment) => segment.trim());
  },

  /**
   * Coerce to map: JSON object, or an empty map
   */
  map: (raw) => {
    if (isPlainObject(raw)) return raw;

    const text = textOf(raw);
    if (text === '') return {};

    const parsed = parseJson(text);
    return isPlainObject(parsed) ? parsed : {};
  },

  /**
   * Coerce to an interned symbol
   */
  symbol: (raw) => (typeof raw === 'symbol' ? raw : Symbol.for(textOf(raw))),
};

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Coerce a raw value into the shape of the given type
 */
export function coerce<T extends VariableType>(raw: unknown, type: T): TypeMap[T] {
  return coercions[type](raw);
}

/**
 * Check whether a name is one of the supported variable types
 */
export function isVariableType(type: unknown): type is VariableType {
  return typeof type === 'string' && Object.hasOwn(coercions, type);
}

/**
 * String form of a typed value, used by presence and length checks.
 *
 * Arrays join with commas (their comma-separated source form), maps render
 * as JSON, absent values are empty.
 */
export function stringForm(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.map(stringForm).join(',');
  if (isPlainObject(value)) return JSON.stringify(value);
  return textOf(value);
}

/**
 * Whether a value counts as blank: absent, or with an empty string form
 */
export function isBlank(value: unknown): boolean {
  return stringForm(value) === '';
}
