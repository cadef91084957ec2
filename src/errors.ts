/**
 * Custom error classes for envar-registry
 */

import { displayNameFor } from './variables/naming.js';

/**
 * Base error class for all registry errors
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when a variable name was never declared
 */
export class UnknownVariableError extends RegistryError {
  readonly variable: string;

  constructor(variable: string) {
    super(`Unknown variable '${variable}'`);
    this.name = 'UnknownVariableError';
    this.variable = variable;
  }
}

/**
 * Error thrown when a write has no writer to go to
 */
export class ReadOnlyError extends RegistryError {
  readonly variable: string;

  constructor(variable: string) {
    super(
      `Cannot write to '${variable}': variable is read-only. Provide a writer callback to enable writing.`
    );
    this.name = 'ReadOnlyError';
    this.variable = variable;
  }
}

/**
 * Error thrown at declaration time for a rule the validation engine cannot evaluate
 */
export class UnsupportedRuleError extends RegistryError {
  readonly variable: string;
  readonly rule: string;
  readonly engine: string;

  constructor(variable: string, rule: string, engine: string) {
    super(`Validation rule '${rule}' on '${variable}' is not supported by the ${engine} engine`);
    this.name = 'UnsupportedRuleError';
    this.variable = variable;
    this.rule = rule;
    this.engine = engine;
  }
}

/**
 * Error thrown at declaration time for a type outside the supported set
 */
export class InvalidTypeError extends RegistryError {
  readonly variable: string;
  readonly type: unknown;

  constructor(variable: string, type: unknown) {
    super(`Variable '${variable}' has unsupported type '${String(type)}'`);
    this.name = 'InvalidTypeError';
    this.variable = variable;
    this.type = type;
  }
}

/**
 * Violations grouped by variable name
 */
export class ErrorCollection {
  private readonly errors: Map<string, string[]> = new Map();

  add(variable: string, message: string): void {
    const existing = this.errors.get(variable) ?? [];
    existing.push(message);
    this.errors.set(variable, existing);
  }

  has(variable: string): boolean {
    return this.errors.has(variable);
  }

  get(variable: string): string[] {
    return this.errors.get(variable) ?? [];
  }

  get isEmpty(): boolean {
    return this.errors.size === 0;
  }

  get size(): number {
    return this.errors.size;
  }

  get variables(): string[] {
    return [...this.errors.keys()];
  }

  get messages(): Record<string, string[]> {
    return Object.fromEntries(this.errors);
  }

  /**
   * Messages prefixed with the variable's display name
   */
  get fullMessages(): string[] {
    const parts: string[] = [];
    for (const [variable, msgs] of this.errors) {
      const displayName = displayNameFor(variable);
      for (const msg of msgs) {
        parts.push(`${displayName} ${msg}`);
      }
    }
    return parts;
  }

  get fullMessage(): string {
    return this.fullMessages.join(', ');
  }

  clear(): void {
    this.errors.clear();
  }

  [Symbol.iterator](): IterableIterator<[string, string[]]> {
    return this.errors[Symbol.iterator]();
  }
}

/**
 * Error thrown when one or more variables fail validation
 */
export class ValidationError extends RegistryError {
  readonly errors: ErrorCollection;

  constructor(errors: ErrorCollection) {
    super(errors.fullMessage);
    this.name = 'ValidationError';
    this.errors = errors;
  }

  get messages(): string[] {
    return this.errors.fullMessages;
  }

  get variables(): string[] {
    return this.errors.variables;
  }
}
