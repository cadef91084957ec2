/**
 * Zod validation engine
 *
 * Evaluates the base rules and the extended ones (numericality, comparison,
 * exclusion, absence, custom predicates, raw zod schemas) as zod schemas.
 * Issue messages are reported verbatim.
 */

import { z, type ZodTypeAny } from 'zod';
import { getConfiguration, type ValidatorRegistry } from '../config.js';
import { isBlank, stringForm } from '../variables/coercions.js';
import { isAbsent, isPlainObject } from '../utils/types.js';
import { RuleEngine, type RuleValidator, type ValidationContext } from './engine.js';
import {
  characterLength,
  describeValue,
  flagOf,
  includesValue,
  listOf,
  messageOf,
  numberOf,
  patternsOf,
  rangeOf,
} from './options.js';
import { matches } from './rules.js';

/**
 * Run a schema and collect its issue messages
 */
function issuesOf(schema: ZodTypeAny, value: unknown): string[] | undefined {
  const result = schema.safeParse(value);
  if (result.success) return undefined;
  return result.error.issues.map((issue) => issue.message);
}

/**
 * Numeric strings are compared as numbers
 */
function toNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return value;
}

function compareValues(left: unknown, right: unknown): number | undefined {
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return undefined;
}

const COMPARISONS: readonly [string, (order: number) => boolean, string][] = [
  ['greaterThan', (order) => order > 0, 'must be greater than'],
  ['greaterThanOrEqualTo', (order) => order >= 0, 'must be greater than or equal to'],
  ['lessThan', (order) => order < 0, 'must be less than'],
  ['lessThanOrEqualTo', (order) => order <= 0, 'must be less than or equal to'],
  ['equalTo', (order) => order === 0, 'must be equal to'],
  ['otherThan', (order) => order !== 0, 'must be other than'],
];

/**
 * Zod-backed validators
 */
export const zodValidators: Readonly<Record<string, RuleValidator>> = {
  presence: (value, params) =>
    issuesOf(
      z.unknown().refine((v) => !isBlank(v), { message: messageOf(params) ?? "can't be blank" }),
      value
    ),

  absence: (value, params) =>
    issuesOf(
      z.unknown().refine((v) => isBlank(v), { message: messageOf(params) ?? 'must be blank' }),
      value
    ),

  length: (value, params) => {
    if (isAbsent(value)) return undefined;

    const message = messageOf(params);
    const range = rangeOf(params, 'range');
    const minimum = numberOf(params, 'minimum') ?? range?.[0];
    const maximum = numberOf(params, 'maximum') ?? range?.[1];
    const is = numberOf(params, 'is');

    // Counted in characters; zod's min/max/length count UTF-16 units
    const schema = z.string().superRefine((text, ctx) => {
      const fail = (phrase: string): void => {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: message ?? phrase });
      };

      const len = characterLength(text);
      if (minimum !== undefined && len < minimum) {
        fail(`is too short (minimum is ${minimum} characters)`);
      }
      if (maximum !== undefined && len > maximum) {
        fail(`is too long (maximum is ${maximum} characters)`);
      }
      if (is !== undefined && len !== is) {
        fail(`is the wrong length (should be ${is} characters)`);
      }
    });

    return issuesOf(schema, stringForm(value));
  },

  format: (value, params) => {
    if (isAbsent(value)) return undefined;

    const message = messageOf(params) ?? 'is invalid';
    const { with: pattern, without } = patternsOf(params);

    const base = pattern ? z.string().regex(pattern, { message }) : z.string();
    const schema = without ? base.refine((text) => !matches(without, text), { message }) : base;

    return issuesOf(schema, stringForm(value));
  },

  inclusion: (value, params) => {
    if (isAbsent(value)) return undefined;

    const list = listOf(params);
    return issuesOf(
      z.unknown().refine((v) => includesValue(list, v), {
        message: messageOf(params) ?? 'is not included in the list',
      }),
      value
    );
  },

  exclusion: (value, params) => {
    if (isAbsent(value)) return undefined;

    const list = listOf(params);
    return issuesOf(
      z.unknown().refine((v) => !includesValue(list, v), { message: messageOf(params) ?? 'is reserved' }),
      value
    );
  },

  numericality: (value, params) => {
    if (isAbsent(value)) return undefined;

    const message = messageOf(params);
    let schema = z.number({ invalid_type_error: message ?? 'is not a number' });

    if (flagOf(params, 'onlyInteger')) {
      schema = schema.int({ message: message ?? 'must be an integer' });
    }

    const greaterThan = numberOf(params, 'greaterThan');
    if (greaterThan !== undefined) {
      schema = schema.gt(greaterThan, { message: message ?? `must be greater than ${greaterThan}` });
    }

    const greaterThanOrEqualTo = numberOf(params, 'greaterThanOrEqualTo');
    if (greaterThanOrEqualTo !== undefined) {
      schema = schema.gte(greaterThanOrEqualTo, {
        message: message ?? `must be greater than or equal to ${greaterThanOrEqualTo}`,
      });
    }

    const lessThan = numberOf(params, 'lessThan');
    if (lessThan !== undefined) {
      schema = schema.lt(lessThan, { message: message ?? `must be less than ${lessThan}` });
    }

    const lessThanOrEqualTo = numberOf(params, 'lessThanOrEqualTo');
    if (lessThanOrEqualTo !== undefined) {
      schema = schema.lte(lessThanOrEqualTo, {
        message: message ?? `must be less than or equal to ${lessThanOrEqualTo}`,
      });
    }

    const equalTo = numberOf(params, 'equalTo');
    const otherThan = numberOf(params, 'otherThan');
    const odd = flagOf(params, 'odd');
    const even = flagOf(params, 'even');

    const refined = schema.superRefine((n, ctx) => {
      const fail = (phrase: string): void => {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: message ?? phrase });
      };

      if (equalTo !== undefined && n !== equalTo) fail(`must be equal to ${equalTo}`);
      if (otherThan !== undefined && n === otherThan) fail(`must be other than ${otherThan}`);
      if (odd && Math.abs(n % 2) !== 1) fail('must be odd');
      if (even && n % 2 !== 0) fail('must be even');
    });

    return issuesOf(z.preprocess(toNumber, refined), value);
  },

  comparison: (value, params, context) => {
    if (isAbsent(value) || !isPlainObject(params)) return undefined;

    const operands: Record<string, unknown> = params;
    const message = messageOf(params);
    const schema = z.unknown().superRefine((v, ctx) => {
      for (const [key, holds, phrase] of COMPARISONS) {
        const operand = operandOf(operands[key], context);
        if (isAbsent(operand)) continue;

        const order = compareValues(toNumber(v), toNumber(operand));
        if (order === undefined || !holds(order)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: message ?? `${phrase} ${describeValue(operand)}`,
          });
        }
      }
    });

    return issuesOf(schema, value);
  },

  custom: (value, params) => {
    if (!isPlainObject(params)) return undefined;

    const predicate = params.with;
    if (typeof predicate !== 'function') return undefined;

    return issuesOf(
      z.unknown().refine((v) => Boolean(predicate(v)), { message: messageOf(params) ?? 'is invalid' }),
      value
    );
  },

  schema: (value, params) => {
    if (!(params instanceof z.ZodType)) return undefined;
    return issuesOf(params, value);
  },
};

/**
 * A string operand names another variable; anything else is a literal
 */
function operandOf(operand: unknown, context: ValidationContext): unknown {
  return typeof operand === 'string' ? context.resolve(operand) : operand;
}

export class ZodValidationEngine extends RuleEngine {
  readonly name = 'zod';

  private readonly validators?: ValidatorRegistry;

  /**
   * @param validators - custom rules consulted for names zod does not cover;
   *   the global registry when omitted
   */
  constructor(validators?: ValidatorRegistry) {
    super();
    this.validators = validators;
  }

  protected validatorFor(rule: string): RuleValidator | undefined {
    if (Object.hasOwn(zodValidators, rule)) return zodValidators[rule];
    return (this.validators ?? getConfiguration().validators).get(rule);
  }
}
