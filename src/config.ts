/**
 * envar-registry Global Configuration
 */

import type { LoggerOptions } from './logging/logger.js';
import type { RuleValidator, ValidationEngine } from './validation/engine.js';

/**
 * Global configuration options
 */
export interface EnvarConfiguration {
  /** Engine for registries constructed without one (default: built-in) */
  validationEngine?: ValidationEngine;

  /** Default logger options for registries constructed without a logger */
  logger: LoggerOptions;

  /** Custom rules understood by the built-in engine */
  validators: ValidatorRegistry;
}

/**
 * Validator registry
 */
export class ValidatorRegistry {
  private _validators: Map<string, RuleValidator> = new Map();

  get registry(): ReadonlyMap<string, RuleValidator> {
    return this._validators;
  }

  register(name: string, fn: RuleValidator): void {
    this._validators.set(name, fn);
  }

  deregister(name: string): boolean {
    return this._validators.delete(name);
  }

  get(name: string): RuleValidator | undefined {
    return this._validators.get(name);
  }

  has(name: string): boolean {
    return this._validators.has(name);
  }

  clear(): void {
    this._validators.clear();
  }
}

/**
 * Default configuration
 */
function createDefaultConfiguration(): EnvarConfiguration {
  return {
    logger: { level: 'warn' },
    validators: new ValidatorRegistry(),
  };
}

/**
 * Global configuration instance
 */
let configuration: EnvarConfiguration = createDefaultConfiguration();

/**
 * Get the current configuration
 */
export function getConfiguration(): EnvarConfiguration {
  return configuration;
}

/**
 * Configure envar-registry globally
 */
export function configure(
  fn: (config: EnvarConfiguration) => void
): void {
  fn(configuration);
}

/**
 * Reset configuration to defaults
 */
export function resetConfiguration(): void {
  configuration = createDefaultConfiguration();
}

/**
 * Envar namespace for global operations
 */
export const Envar = {
  /**
   * Get the current configuration
   */
  get configuration(): EnvarConfiguration {
    return configuration;
  },

  configure,

  resetConfiguration,
};

export default Envar;
