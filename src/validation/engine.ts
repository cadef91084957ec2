/**
 * Validation engine capability
 */

import { UnsupportedRuleError } from '../errors.js';
import type { ValidationRules, VariableType } from '../variables/types.js';

/**
 * What a rule sees besides the value and its own parameters
 */
export interface ValidationContext {
  /** Declared variable name */
  variable: string;
  /** Humanized name used in messages */
  displayName: string;
  /** Declared type */
  type: VariableType;
  /** Resolve another declared variable (cross-field rules) */
  resolve: (name: string) => unknown;
}

/**
 * A single rule. Returns the violation phrase(s), or nothing when the value passes.
 */
export type RuleValidator = (
  value: unknown,
  params: unknown,
  context: ValidationContext
) => string | readonly string[] | undefined;

/**
 * Validation engine interface. Engines return phrases ("can't be blank");
 * the registry prefixes the display name.
 */
export interface ValidationEngine {
  readonly name: string;

  /** Whether the engine evaluates the named rule */
  supports(rule: string): boolean;

  /**
   * Reject rules the engine cannot evaluate.
   * @throws UnsupportedRuleError
   */
  check(variable: string, rules: ValidationRules): void;

  /** Violation phrases for one value, in rule declaration order */
  validate(value: unknown, rules: ValidationRules, context: ValidationContext): string[];
}

/**
 * Rule-table engine. Subclasses provide the validator for each rule name.
 */
export abstract class RuleEngine implements ValidationEngine {
  abstract readonly name: string;

  protected abstract validatorFor(rule: string): RuleValidator | undefined;

  supports(rule: string): boolean {
    return this.validatorFor(rule) !== undefined;
  }

  check(variable: string, rules: ValidationRules): void {
    for (const rule of Object.keys(rules)) {
      if (!this.supports(rule)) {
        throw new UnsupportedRuleError(variable, rule, this.name);
      }
    }
  }

  validate(value: unknown, rules: ValidationRules, context: ValidationContext): string[] {
    const violations: string[] = [];

    for (const [rule, params] of Object.entries(rules)) {
      if (params === undefined || params === false) continue;

      const validator = this.validatorFor(rule);
      if (!validator) {
        throw new UnsupportedRuleError(context.variable, rule, this.name);
      }

      const result = validator(value, params, context);
      if (typeof result === 'string') {
        violations.push(result);
      } else if (result) {
        violations.push(...result);
      }
    }

    return violations;
  }
}
