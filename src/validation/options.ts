/**
 * Rule parameter readers. Rule parameters arrive as plain data, so each
 * validator reads them through these narrowing helpers.
 */

import { isDeepStrictEqual } from 'node:util';
import { isPlainObject } from '../utils/types.js';

export function messageOf(params: unknown): string | undefined {
  if (!isPlainObject(params)) return undefined;
  return typeof params.message === 'string' ? params.message : undefined;
}

export function numberOf(params: unknown, key: string): number | undefined {
  if (!isPlainObject(params)) return undefined;
  const value = params[key];
  return typeof value === 'number' ? value : undefined;
}

export function flagOf(params: unknown, key: string): boolean {
  return isPlainObject(params) && params[key] === true;
}

export function regexOf(params: unknown, key: string): RegExp | undefined {
  if (!isPlainObject(params)) return undefined;
  const value = params[key];
  return value instanceof RegExp ? value : undefined;
}

export function rangeOf(params: unknown, key: string): readonly [number, number] | undefined {
  if (!isPlainObject(params)) return undefined;
  const value = params[key];
  if (!Array.isArray(value) || value.length !== 2) return undefined;
  const [low, high]: unknown[] = value;
  return typeof low === 'number' && typeof high === 'number' ? [low, high] : undefined;
}

/**
 * List for inclusion/exclusion: a bare array or `{ in: [...] }`
 */
export function listOf(params: unknown): readonly unknown[] {
  if (Array.isArray(params)) return params;
  if (isPlainObject(params) && Array.isArray(params.in)) return params.in;
  return [];
}

/**
 * Membership by value: arrays and maps match when their contents are equal
 */
export function includesValue(list: readonly unknown[], value: unknown): boolean {
  return list.some((item) => isDeepStrictEqual(item, value));
}

/**
 * Length in characters (code points), not UTF-16 units
 */
export function characterLength(text: string): number {
  return [...text].length;
}

/**
 * Format patterns: a bare RegExp or `{ with, without }`
 */
export function patternsOf(params: unknown): { with?: RegExp; without?: RegExp } {
  if (params instanceof RegExp) return { with: params };
  return { with: regexOf(params, 'with'), without: regexOf(params, 'without') };
}

/**
 * Render a value inside a message
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'symbol') return value.description ?? '';
  return String(value);
}
