/**
 * Variable declaration types
 */

import type { ZodTypeAny } from 'zod';
import type { Callable } from '../utils/types.js';

/**
 * Supported variable types. The set is closed.
 */
export type VariableType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'array'
  | 'map'
  | 'symbol';

/**
 * Typed value shape for each variable type
 */
export interface TypeMap {
  string: string;
  integer: number;
  float: number;
  boolean: boolean;
  array: unknown[];
  map: Record<string, unknown>;
  symbol: symbol;
}

/**
 * Reader callback. Receives the storage key and the frozen spec and returns
 * the raw value, or null/undefined when the backend holds nothing.
 */
export type Reader = Callable<[storageKey: string, spec: VariableSpec], unknown>;

/**
 * Writer callback. Receives the storage key, the typed value and the frozen spec.
 */
export type Writer = Callable<[storageKey: string, value: unknown, spec: VariableSpec], void>;

// ============================================
// Validation rules
// ============================================

export interface MessageOption {
  message?: string;
}

export interface LengthRule extends MessageOption {
  minimum?: number;
  maximum?: number;
  is?: number;
  range?: readonly [number, number];
}

export type FormatRule =
  | RegExp
  | (MessageOption & { with?: RegExp; without?: RegExp });

export type ListRule = readonly unknown[] | (MessageOption & { in: readonly unknown[] });

export interface NumericalityRule extends MessageOption {
  onlyInteger?: boolean;
  greaterThan?: number;
  greaterThanOrEqualTo?: number;
  lessThan?: number;
  lessThanOrEqualTo?: number;
  equalTo?: number;
  otherThan?: number;
  odd?: boolean;
  even?: boolean;
}

/**
 * Comparison operand: a literal, or the name of another declared variable.
 */
export type ComparisonOperand = number | string;

export interface ComparisonRule extends MessageOption {
  greaterThan?: ComparisonOperand;
  greaterThanOrEqualTo?: ComparisonOperand;
  lessThan?: ComparisonOperand;
  lessThanOrEqualTo?: ComparisonOperand;
  equalTo?: ComparisonOperand;
  otherThan?: ComparisonOperand;
}

export interface CustomRule extends MessageOption {
  with: (value: unknown) => boolean;
}

/**
 * Ordered rule-name to rule-parameters mapping. Key order is evaluation order.
 *
 * `presence`, `length`, `format` and `inclusion` are understood by every
 * engine. The remaining named rules need the zod engine; other keys must
 * name a validator registered with `registerValidator`.
 */
export interface ValidationRules {
  presence?: boolean | MessageOption;
  length?: LengthRule;
  format?: FormatRule;
  inclusion?: ListRule;
  numericality?: boolean | NumericalityRule;
  comparison?: ComparisonRule;
  exclusion?: ListRule;
  absence?: boolean | MessageOption;
  custom?: CustomRule;
  schema?: ZodTypeAny;
  [rule: string]: unknown;
}

// ============================================
// Declarations
// ============================================

/**
 * Options accepted by `Registry.declare`
 */
export interface VariableDefinition<T extends VariableType = VariableType> {
  type?: T;
  default?: TypeMap[T] | null;
  validates?: ValidationRules;
  reader?: Reader;
  writer?: Writer;
  description?: string;
}

/**
 * A declared variable
 */
export interface VariableSpec<T extends VariableType = VariableType> {
  readonly name: string;
  readonly storageKey: string;
  readonly type: T;
  readonly default: TypeMap[T] | null;
  readonly validationRules?: ValidationRules;
  readonly reader?: Reader;
  readonly writer?: Writer;
  readonly description?: string;
}

/**
 * Environment table used as the default backend
 */
export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Define a typed variable for a settings schema.
 *
 * @example
 * ```typescript
 * const schema = {
 *   port: variable('integer', { default: 3000 }),
 *   debug: variable('boolean', { default: false }),
 * };
 * ```
 */
export function variable<T extends VariableType>(type: T): { type: T };
export function variable<
  T extends VariableType,
  O extends Omit<VariableDefinition<T>, 'type'>,
>(type: T, options: O): O & { type: T };
export function variable(
  type: VariableType,
  options: Omit<VariableDefinition, 'type'> = {}
): VariableDefinition {
  return { ...options, type };
}
