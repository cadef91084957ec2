/**
 * Accessors - per-variable dispatch table over a registry
 */

import { Registry, type RegistryOptions } from './registry.js';
import type { TypeMap, VariableDefinition, VariableType } from './variables/types.js';

/**
 * Accessor for one declared variable
 */
export interface VariableAccessor<V = unknown> {
  readonly name: string;
  get(): V;
  set(value: V): void;
  isPresent(): boolean;
  /** Truthiness check, boolean variables only */
  isEnabled?(): boolean;
}

/**
 * Dispatch table, variable name to accessor
 */
export type AccessorTable = Record<string, VariableAccessor>;

/**
 * Build one accessor per declared variable. Each accessor is a thin
 * pass-through to the registry.
 */
export function buildAccessors(registry: Registry): AccessorTable {
  const table: AccessorTable = {};

  for (const spec of registry.specs) {
    const { name } = spec;
    const accessor: VariableAccessor = {
      name,
      get: () => registry.get(name),
      set: (value) => registry.set(name, value),
      isPresent: () => registry.isPresent(name),
    };

    if (spec.type === 'boolean') {
      accessor.isEnabled = () => Boolean(registry.get(name));
    }

    table[name] = accessor;
  }

  return table;
}

// ============================================
// Typed settings
// ============================================

/**
 * Schema of variable definitions, keyed by variable name
 */
export type SettingsSchema = Record<string, VariableDefinition>;

/** Declared type of a definition ('string' when omitted) */
export type TypeOf<D> = D extends { type: infer T extends VariableType } ? T : 'string';

/** Value returned by a definition's accessor; nullable unless a non-null default is declared */
export type ValueOf<D> = D extends { default: infer X }
  ? null extends X
    ? TypeMap[TypeOf<D>] | null
    : TypeMap[TypeOf<D>]
  : TypeMap[TypeOf<D>] | null;

/** Typed accessor for a definition */
export type TypedAccessor<D> = {
  readonly name: string;
  get(): ValueOf<D>;
  set(value: ValueOf<D>): void;
  isPresent(): boolean;
} & (TypeOf<D> extends 'boolean' ? { isEnabled(): boolean } : unknown);

export type TypedAccessors<S extends SettingsSchema> = {
  readonly [K in keyof S & string]: TypedAccessor<S[K]>;
};

export interface DefinedSettings<S extends SettingsSchema> {
  registry: Registry;
  accessors: TypedAccessors<S>;
}

/**
 * Declare a schema on a new registry and return typed accessors.
 *
 * @example
 * ```typescript
 * const { accessors } = defineSettings({
 *   port: variable('integer', { default: 3000 }),
 *   debug: variable('boolean', { default: false }),
 * });
 *
 * accessors.port.get();        // number
 * accessors.debug.isEnabled(); // boolean
 * ```
 */
export function defineSettings<S extends SettingsSchema>(
  schema: S,
  options?: RegistryOptions
): DefinedSettings<S> {
  const registry = new Registry(options);

  for (const [name, definition] of Object.entries(schema)) {
    registry.declare(name, definition);
  }

  // Values are coerced to each declared type at runtime; the table is typed
  // from the schema.
  const accessors = buildAccessors(registry) as unknown as TypedAccessors<S>;

  return { registry, accessors };
}
