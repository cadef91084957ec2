/**
 * envar-registry - declared, typed, validated configuration variables
 *
 * @example
 * ```typescript
 * import { Registry } from 'envar-registry';
 *
 * const settings = new Registry();
 *
 * settings.declare('port', { type: 'integer', default: 3000 });
 * settings.declare('allowed_hosts', { type: 'array', default: [] });
 * settings.declare('database_url', { validates: { presence: true } });
 *
 * settings.validateAll();      // throws ValidationError listing every violation
 * settings.get('port');        // PORT from the environment, as a number
 * settings.set('port', 8080);  // throws ReadOnlyError: no writer declared
 * ```
 */

// Core
export {
  Registry,
  createRegistry,
  type RegistryOptions,
} from './registry.js';

export {
  buildAccessors,
  defineSettings,
  type VariableAccessor,
  type AccessorTable,
  type SettingsSchema,
  type TypedAccessor,
  type TypedAccessors,
  type DefinedSettings,
  type TypeOf,
  type ValueOf,
} from './accessors.js';

export {
  Settings,
  type SettingsClass,
  type SettingsDefaults,
} from './settings.js';

// Variables
export {
  variable,
  type VariableType,
  type TypeMap,
  type VariableDefinition,
  type VariableSpec,
  type Reader,
  type Writer,
  type Environment,
  type ValidationRules,
  type LengthRule,
  type FormatRule,
  type ListRule,
  type NumericalityRule,
  type ComparisonRule,
  type ComparisonOperand,
  type CustomRule,
  type MessageOption,
} from './variables/types.js';

export {
  coercions,
  coerce,
  isVariableType,
  isBlank,
  stringForm,
  type CoercionFunction,
} from './variables/coercions.js';

export { storageKeyFor, displayNameFor } from './variables/naming.js';

export {
  resolveReader,
  resolveWriter,
  type ReadSource,
  type WriteSource,
  type ReadResolution,
  type WriteResolution,
  type Fallbacks,
} from './resolution.js';

// Validation
export {
  RuleEngine,
  BuiltinValidationEngine,
  ZodValidationEngine,
  baseValidators,
  zodValidators,
  isBaseRule,
  registerValidator,
  deregisterValidator,
  type ValidationEngine,
  type ValidationContext,
  type RuleValidator,
  type BaseRule,
} from './validation/index.js';

// Errors
export {
  RegistryError,
  UnknownVariableError,
  ReadOnlyError,
  UnsupportedRuleError,
  InvalidTypeError,
  ValidationError,
  ErrorCollection,
} from './errors.js';

// Configuration
export {
  configure,
  getConfiguration,
  resetConfiguration,
  ValidatorRegistry,
  Envar,
  type EnvarConfiguration,
} from './config.js';

// Logging
export {
  Logger,
  createLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type RegistryEvent,
  type Operation,
  type Outcome,
} from './logging/logger.js';

// Utilities
export { type Callable, resolveCallable } from './utils/types.js';
