/**
 * Base Validators
 *
 * The four rules every engine understands.
 */

import { getConfiguration } from '../config.js';
import { isBlank, stringForm } from '../variables/coercions.js';
import { isAbsent } from '../utils/types.js';
import type { RuleValidator } from './engine.js';
import {
  characterLength,
  includesValue,
  listOf,
  messageOf,
  numberOf,
  patternsOf,
  rangeOf,
} from './options.js';

/**
 * Base rule names
 */
export type BaseRule = 'presence' | 'length' | 'format' | 'inclusion';

/**
 * Base validator registry
 */
export const baseValidators: Readonly<Record<BaseRule, RuleValidator>> = {
  /**
   * Presence - value must not be absent or have an empty string form
   */
  presence: (value, params) => {
    if (isBlank(value)) {
      return messageOf(params) ?? "can't be blank";
    }
    return undefined;
  },

  /**
   * Length - string form length constraints
   */
  length: (value, params) => {
    if (isAbsent(value)) return undefined;

    const len = characterLength(stringForm(value));
    const message = messageOf(params);
    const range = rangeOf(params, 'range');
    const minimum = numberOf(params, 'minimum') ?? range?.[0];
    const maximum = numberOf(params, 'maximum') ?? range?.[1];
    const is = numberOf(params, 'is');

    if (minimum !== undefined && len < minimum) {
      return message ?? `is too short (minimum is ${minimum} characters)`;
    }

    if (maximum !== undefined && len > maximum) {
      return message ?? `is too long (maximum is ${maximum} characters)`;
    }

    if (is !== undefined && len !== is) {
      return message ?? `is the wrong length (should be ${is} characters)`;
    }

    return undefined;
  },

  /**
   * Format - string form must match `with` and must not match `without`
   */
  format: (value, params) => {
    if (isAbsent(value)) return undefined;

    const text = stringForm(value);
    const patterns = patternsOf(params);

    if (patterns.with && !matches(patterns.with, text)) {
      return messageOf(params) ?? 'is invalid';
    }

    if (patterns.without && matches(patterns.without, text)) {
      return messageOf(params) ?? 'is invalid';
    }

    return undefined;
  },

  /**
   * Inclusion - value must be in the list
   */
  inclusion: (value, params) => {
    if (isAbsent(value)) return undefined;

    if (!includesValue(listOf(params), value)) {
      return messageOf(params) ?? 'is not included in the list';
    }
    return undefined;
  },
};

/**
 * Test a pattern without carrying `lastIndex` over from a previous call
 */
export function matches(pattern: RegExp, text: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(text);
}

/**
 * Check whether a rule name is a base rule
 */
export function isBaseRule(rule: string): rule is BaseRule {
  return Object.hasOwn(baseValidators, rule);
}

/**
 * Register a custom rule for the built-in engine
 */
export function registerValidator(name: string, fn: RuleValidator): void {
  getConfiguration().validators.register(name, fn);
}

/**
 * Deregister a custom rule
 */
export function deregisterValidator(name: string): boolean {
  return getConfiguration().validators.deregister(name);
}
