/**
 * Settings - base class for declaring a registry as a subclass
 */

import { buildAccessors, type AccessorTable, type SettingsSchema } from './accessors.js';
import { Registry, type RegistryOptions } from './registry.js';
import type { Reader, Writer } from './variables/types.js';

/**
 * One registry per concrete subclass, created on first use
 */
const registries = new WeakMap<object, Registry>();

const accessorTables = new WeakMap<object, AccessorTable>();

/**
 * Settings class type for static methods
 */
export interface SettingsClass {
  variables?: SettingsSchema;
  defaults?: SettingsDefaults;
  options?: RegistryOptions;
}

/**
 * Fallback callbacks for variables without their own
 */
export interface SettingsDefaults {
  defaultReader?: Reader;
  defaultWriter?: Writer;
}

/**
 * Base class for application settings. Each subclass owns exactly one
 * registry, built from its static `variables` the first time it is used.
 *
 * @example
 * ```typescript
 * class AppSettings extends Settings {
 *   static override variables = {
 *     port: variable('integer', { default: 3000 }),
 *     database_url: variable('string', { validates: { presence: true } }),
 *   };
 * }
 *
 * AppSettings.validate();
 * AppSettings.get('port'); // 3000
 * ```
 */
export abstract class Settings {
  // Static configuration (override in subclasses)
  static variables?: SettingsSchema;
  static defaults?: SettingsDefaults;
  static options?: RegistryOptions;

  /**
   * The subclass's registry
   */
  static get registry(): Registry {
    const existing = registries.get(this);
    if (existing) return existing;

    const settingsClass: SettingsClass = this;
    const registry = new Registry({ ...settingsClass.options, ...settingsClass.defaults });
    for (const [name, definition] of Object.entries(settingsClass.variables ?? {})) {
      registry.declare(name, definition);
    }

    registries.set(this, registry);
    return registry;
  }

  static get(name: string): unknown {
    return this.registry.get(name);
  }

  static set(name: string, value: unknown): void {
    this.registry.set(name, value);
  }

  static isPresent(name: string): boolean {
    return this.registry.isPresent(name);
  }

  /**
   * Validate every variable, throwing one aggregate ValidationError
   */
  static validate(): void {
    this.registry.validateAll();
  }

  /**
   * Snapshot of every variable
   */
  static all(): Record<string, unknown> {
    return this.registry.enumerate();
  }

  /**
   * Accessor dispatch table for the subclass's variables, built once
   */
  static get accessors(): AccessorTable {
    const existing = accessorTables.get(this);
    if (existing) return existing;

    const table = buildAccessors(this.registry);
    accessorTables.set(this, table);
    return table;
  }
}
