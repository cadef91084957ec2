/**
 * Registry - declared, typed configuration variables over pluggable backends
 */

import { getConfiguration } from './config.js';
import {
  ErrorCollection,
  InvalidTypeError,
  ReadOnlyError,
  UnknownVariableError,
  ValidationError,
} from './errors.js';
import { Logger, createLogger } from './logging/logger.js';
import { resolveReader, resolveWriter, type Fallbacks } from './resolution.js';
import { BuiltinValidationEngine } from './validation/builtin.js';
import type { ValidationContext, ValidationEngine } from './validation/engine.js';
import { coerce, isBlank, isVariableType } from './variables/coercions.js';
import { displayNameFor, storageKeyFor } from './variables/naming.js';
import type {
  Environment,
  Reader,
  VariableDefinition,
  VariableSpec,
  VariableType,
  Writer,
} from './variables/types.js';
import { isAbsent } from './utils/types.js';

/**
 * Registry construction options
 */
export interface RegistryOptions {
  /** Validation engine (default: configured engine, else built-in) */
  validationEngine?: ValidationEngine;
  /** Logger (default: built from the configured logger options) */
  logger?: Logger;
  /** Default backend (default: process.env, read at access time) */
  environment?: Environment;
  /** Fallback reader for variables without their own */
  defaultReader?: Reader;
  /** Fallback writer for variables without their own */
  defaultWriter?: Writer;
}

/**
 * Catalog of declared variables.
 *
 * @example
 * ```typescript
 * const registry = new Registry();
 *
 * registry.declare('port', { type: 'integer', default: 3000 });
 * registry.declare('username', {
 *   validates: { presence: true, length: { minimum: 3, maximum: 20 } },
 *   writer: (key, value) => store.set(key, value),
 * });
 *
 * registry.get('port');            // 3000, or PORT from the environment
 * registry.set('username', 'ab');  // throws ValidationError
 * registry.validateAll();
 * ```
 */
export class Registry {
  /** Engine evaluating validation rules */
  readonly validationEngine: ValidationEngine;

  /** Operation logger */
  readonly logger: Logger;

  private readonly _specs: Map<string, VariableSpec> = new Map();
  private readonly _environment?: Environment;
  private _defaultReader?: Reader;
  private _defaultWriter?: Writer;

  constructor(options: RegistryOptions = {}) {
    const config = getConfiguration();

    this.validationEngine =
      options.validationEngine ??
      config.validationEngine ??
      new BuiltinValidationEngine(config.validators);
    this.logger = options.logger ?? createLogger(config.logger);
    this._environment = options.environment;
    this._defaultReader = options.defaultReader;
    this._defaultWriter = options.defaultWriter;
  }

  // ============================================
  // Declaration
  // ============================================

  /**
   * Declare a variable, replacing any earlier declaration of the same name.
   * @throws InvalidTypeError for a type outside the supported set
   * @throws UnsupportedRuleError for a rule the validation engine cannot evaluate
   */
  declare<T extends VariableType>(
    name: string,
    definition: VariableDefinition<T> & { type: T }
  ): VariableSpec<T>;
  declare(name: string, definition?: VariableDefinition<'string'>): VariableSpec<'string'>;
  declare(name: string, definition?: VariableDefinition): VariableSpec;
  declare(name: string, definition: VariableDefinition = {}): VariableSpec {
    const type: unknown = definition.type ?? 'string';
    if (!isVariableType(type)) {
      throw new InvalidTypeError(name, type);
    }

    if (definition.validates) {
      this.validationEngine.check(name, definition.validates);
    }

    const spec: VariableSpec = Object.freeze({
      name,
      storageKey: storageKeyFor(name),
      type,
      default: definition.default ?? null,
      validationRules: definition.validates,
      reader: definition.reader,
      writer: definition.writer,
      description: definition.description,
    });

    const replaced = this._specs.has(name);
    this._specs.set(name, spec);

    this.logger.log({
      operation: 'declare',
      outcome: replaced ? 'replaced' : 'declared',
      variable: name,
      storageKey: spec.storageKey,
    });

    return spec;
  }

  /**
   * Set the fallback reader for variables without their own
   */
  defaultReader(reader: Reader): this {
    this._defaultReader = reader;
    return this;
  }

  /**
   * Set the fallback writer for variables without their own
   */
  defaultWriter(writer: Writer): this {
    this._defaultWriter = writer;
    return this;
  }

  // ============================================
  // Introspection
  // ============================================

  /**
   * Declared names, in declaration order
   */
  get names(): string[] {
    return [...this._specs.keys()];
  }

  /**
   * Declared specs, in declaration order
   */
  get specs(): VariableSpec[] {
    return [...this._specs.values()];
  }

  has(name: string): boolean {
    return this._specs.has(name);
  }

  /**
   * Spec for a declared variable
   * @throws UnknownVariableError
   */
  spec(name: string): VariableSpec {
    const spec = this._specs.get(name);
    if (!spec) {
      throw new UnknownVariableError(name);
    }
    return spec;
  }

  /**
   * Whether a write to the variable has a writer to go to
   */
  isWritable(name: string): boolean {
    return resolveWriter(this.spec(name), this.fallbacks()) !== undefined;
  }

  // ============================================
  // Access
  // ============================================

  /**
   * Resolve and coerce a variable's value. The default is returned untouched
   * when the chosen reader yields nothing.
   * @throws UnknownVariableError
   */
  get(name: string): unknown {
    const spec = this.spec(name);
    const resolution = resolveReader(spec, this.fallbacks());
    const raw = resolution.read();

    const defaulted = isAbsent(raw);
    this.logger.log({
      operation: 'get',
      outcome: defaulted ? 'defaulted' : 'resolved',
      variable: name,
      storageKey: spec.storageKey,
      source: resolution.source,
    });

    return defaulted ? spec.default : coerce(raw, spec.type);
  }

  /**
   * Validate then write a typed value. Nothing is written when validation fails.
   * @throws UnknownVariableError
   * @throws ValidationError
   * @throws ReadOnlyError when neither the variable nor the registry has a writer
   */
  set(name: string, value: unknown): void {
    const spec = this.spec(name);

    if (spec.validationRules) {
      const errors = new ErrorCollection();
      this.collect(spec, value, errors);

      if (!errors.isEmpty) {
        this.logger.log({
          operation: 'set',
          outcome: 'invalid',
          variable: name,
          storageKey: spec.storageKey,
          violations: errors.get(name).length,
        });
        throw new ValidationError(errors);
      }
    }

    const resolution = resolveWriter(spec, this.fallbacks());
    if (!resolution) {
      this.logger.log({
        operation: 'set',
        outcome: 'denied',
        variable: name,
        storageKey: spec.storageKey,
      });
      throw new ReadOnlyError(name);
    }

    resolution.write(value);

    this.logger.log({
      operation: 'set',
      outcome: 'written',
      variable: name,
      storageKey: spec.storageKey,
      source: resolution.source,
    });
  }

  /**
   * Whether the resolved value is present: not absent, with a non-empty string form
   * @throws UnknownVariableError
   */
  isPresent(name: string): boolean {
    return !isBlank(this.get(name));
  }

  /**
   * Snapshot of every declared variable's resolved value.
   * Each entry is resolved independently.
   */
  enumerate(): Record<string, unknown> {
    const snapshot: Record<string, unknown> = {};
    for (const name of this._specs.keys()) {
      snapshot[name] = this.get(name);
    }
    return snapshot;
  }

  toJSON(): Record<string, unknown> {
    return this.enumerate();
  }

  // ============================================
  // Validation
  // ============================================

  /**
   * Full violation messages for one variable's current value
   * @throws UnknownVariableError
   */
  validate(name: string): string[] {
    const spec = this.spec(name);
    if (!spec.validationRules) return [];

    const errors = new ErrorCollection();
    this.collect(spec, this.get(name), errors);
    return errors.fullMessages;
  }

  /**
   * Validate every variable that declares rules and report all violations at once.
   * @throws ValidationError listing every violation
   */
  validateAll(): void {
    const errors = new ErrorCollection();

    for (const spec of this._specs.values()) {
      if (!spec.validationRules) continue;
      this.collect(spec, this.get(spec.name), errors);
    }

    this.logger.log({
      operation: 'validate',
      outcome: errors.isEmpty ? 'valid' : 'invalid',
      violations: errors.fullMessages.length,
    });

    if (!errors.isEmpty) {
      throw new ValidationError(errors);
    }
  }

  // ============================================
  // Internals
  // ============================================

  private collect(spec: VariableSpec, value: unknown, errors: ErrorCollection): void {
    if (!spec.validationRules) return;

    const context: ValidationContext = {
      variable: spec.name,
      displayName: displayNameFor(spec.name),
      type: spec.type,
      resolve: (other) => this.get(other),
    };

    for (const message of this.validationEngine.validate(value, spec.validationRules, context)) {
      errors.add(spec.name, message);
    }
  }

  private fallbacks(): Fallbacks {
    return {
      defaultReader: this._defaultReader,
      defaultWriter: this._defaultWriter,
      environment: this._environment ?? process.env,
    };
  }
}

/**
 * Create a new registry
 */
export function createRegistry(options?: RegistryOptions): Registry {
  return new Registry(options);
}
