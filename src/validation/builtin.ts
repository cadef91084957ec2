/**
 * Built-in validation engine: the base rules plus registered custom rules
 */

import { getConfiguration, type ValidatorRegistry } from '../config.js';
import { RuleEngine, type RuleValidator } from './engine.js';
import { baseValidators, isBaseRule } from './rules.js';

export class BuiltinValidationEngine extends RuleEngine {
  readonly name = 'builtin';

  private readonly validators?: ValidatorRegistry;

  /**
   * @param validators - custom rules; the global registry when omitted
   */
  constructor(validators?: ValidatorRegistry) {
    super();
    this.validators = validators;
  }

  protected validatorFor(rule: string): RuleValidator | undefined {
    if (isBaseRule(rule)) return baseValidators[rule];
    return (this.validators ?? getConfiguration().validators).get(rule);
  }
}
