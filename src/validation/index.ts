/**
 * Validation engines
 */

export {
  RuleEngine,
  type ValidationEngine,
  type ValidationContext,
  type RuleValidator,
} from './engine.js';

export {
  baseValidators,
  isBaseRule,
  registerValidator,
  deregisterValidator,
  type BaseRule,
} from './rules.js';

export { BuiltinValidationEngine } from './builtin.js';

export { ZodValidationEngine, zodValidators } from './zod.js';
