/**
 * Registry Tests
 */

import { Writable } from 'node:stream';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { configure, resetConfiguration } from './config.js';
import {
  InvalidTypeError,
  ReadOnlyError,
  UnknownVariableError,
  UnsupportedRuleError,
  ValidationError,
} from './errors.js';
import { Logger } from './logging/logger.js';
import { RawFormatter } from './logging/formatters/raw.js';
import { Registry, createRegistry, type RegistryOptions } from './registry.js';
import { ZodValidationEngine } from './validation/zod.js';
import type { Environment, VariableDefinition } from './variables/types.js';

const quiet = (): Logger => new Logger({ enabled: false });

function registryWith(environment: Environment, options: RegistryOptions = {}): Registry {
  return new Registry({ logger: quiet(), environment, ...options });
}

function collectingLogger(level: 'debug' | 'info' | 'warn' = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString().trimEnd());
      callback();
    },
  });
  return { logger: new Logger({ output, formatter: new RawFormatter(), level }), lines };
}

describe('Registry', () => {
  afterEach(() => {
    resetConfiguration();
  });

  describe('declare', () => {
    it('should derive the storage key and defaults', () => {
      const registry = registryWith({});

      const spec = registry.declare('database_url');

      expect(spec).toEqual({
        name: 'database_url',
        storageKey: 'DATABASE_URL',
        type: 'string',
        default: null,
        validationRules: undefined,
        reader: undefined,
        writer: undefined,
        description: undefined,
      });
      expect(Object.isFrozen(spec)).toBe(true);
    });

    it('should keep declaration order', () => {
      const registry = registryWith({});
      registry.declare('b');
      registry.declare('a');

      expect(registry.names).toEqual(['b', 'a']);
    });

    it('should replace an earlier declaration', () => {
      const registry = registryWith({});
      registry.declare('port', { type: 'integer', default: 3000 });
      registry.declare('port', { type: 'integer', default: 4000 });

      expect(registry.names).toEqual(['port']);
      expect(registry.get('port')).toBe(4000);
    });

    it('should reject unsupported types', () => {
      const registry = registryWith({});
      const definition: VariableDefinition = JSON.parse('{"type":"decimal"}');

      expect(() => registry.declare('port', definition)).toThrow(InvalidTypeError);
      expect(registry.has('port')).toBe(false);
    });

    it('should reject rules the engine cannot evaluate', () => {
      const registry = registryWith({});

      expect(() =>
        registry.declare('port', { type: 'integer', validates: { numericality: true } })
      ).toThrow(UnsupportedRuleError);
      expect(registry.has('port')).toBe(false);
    });
  });

  describe('get', () => {
    it('should coerce the environment value', () => {
      const registry = registryWith({ PORT: '5000' });
      registry.declare('port', { type: 'integer', default: 3000 });

      expect(registry.get('port')).toBe(5000);
    });

    it('should return the default when the value is absent', () => {
      const registry = registryWith({});
      registry.declare('port', { type: 'integer', default: 3000 });

      expect(registry.get('port')).toBe(3000);
    });

    it('should return null when there is no value and no default', () => {
      const registry = registryWith({});
      registry.declare('api_key');

      expect(registry.get('api_key')).toBeNull();
    });

    it('should coerce an empty string rather than default', () => {
      const registry = registryWith({ PORT: '' });
      registry.declare('port', { type: 'integer', default: 3000 });

      expect(registry.get('port')).toBe(0);
    });

    it('should split array values', () => {
      const registry = registryWith({ ALLOWED_HOSTS: 'host1, host2 , host3' });
      registry.declare('allowed_hosts', { type: 'array', default: [] });

      expect(registry.get('allowed_hosts')).toEqual(['host1', 'host2', 'host3']);
    });

    it('should read through the variable reader with the storage key', () => {
      const registry = registryWith({});
      const reader = vi.fn(() => 'true');
      registry.declare('feature_flag', { type: 'boolean', reader });

      expect(registry.get('feature_flag')).toBe(true);
      expect(reader).toHaveBeenCalledWith('FEATURE_FLAG', registry.spec('feature_flag'));
    });

    it('should not fall through to the environment when a reader yields nothing', () => {
      const registry = registryWith({ API_KEY: 'from-env' });
      registry.declare('api_key', { reader: () => undefined, default: 'fallback' });

      expect(registry.get('api_key')).toBe('fallback');
    });

    it('should not fall through to the default reader when a reader yields nothing', () => {
      const defaultReader = vi.fn(() => 'from-default');
      const registry = registryWith({}, { defaultReader });
      registry.declare('region', { reader: () => null, default: 'eu-west' });

      expect(registry.get('region')).toBe('eu-west');
      expect(defaultReader).not.toHaveBeenCalled();
    });

    it('should use the default reader for variables without their own', () => {
      const store: Record<string, string> = { TIMEOUT: '30' };
      const registry = registryWith({ TIMEOUT: '10' }, { defaultReader: (key) => store[key] });
      registry.declare('timeout', { type: 'integer' });

      expect(registry.get('timeout')).toBe(30);
    });

    it('should read process.env when no environment is given', () => {
      vi.stubEnv('ENVAR_REGISTRY_TEST_PORT', '6000');
      try {
        const registry = new Registry({ logger: quiet() });
        registry.declare('envar_registry_test_port', { type: 'integer' });

        expect(registry.get('envar_registry_test_port')).toBe(6000);
      } finally {
        vi.unstubAllEnvs();
      }
    });

    it('should throw for unknown variables', () => {
      expect(() => registryWith({}).get('nope')).toThrow(UnknownVariableError);
    });
  });

  describe('set', () => {
    it('should hand the value and storage key to the writer', () => {
      const writer = vi.fn();
      const registry = registryWith({});
      registry.declare('api_key', { writer });

      registry.set('api_key', 'test-secret');

      expect(writer).toHaveBeenCalledWith('API_KEY', 'test-secret', registry.spec('api_key'));
    });

    it('should write through the default writer', () => {
      const store = new Map<string, unknown>();
      const registry = registryWith({}, {
        defaultReader: (key) => store.get(key),
        defaultWriter: (key, value) => store.set(key, value),
      });
      registry.declare('region', { default: 'eu-west' });

      registry.set('region', 'us-east');

      expect(store.get('REGION')).toBe('us-east');
      expect(registry.get('region')).toBe('us-east');
    });

    it('should raise ReadOnlyError without a writer', () => {
      const registry = registryWith({});
      registry.declare('database_url');

      expect(() => registry.set('database_url', 'postgres://localhost/test')).toThrow(
        "Cannot write to 'database_url': variable is read-only. Provide a writer callback to enable writing."
      );
      expect(registry.isWritable('database_url')).toBe(false);
    });

    it('should validate before writing', () => {
      const writer = vi.fn();
      const registry = registryWith({});
      registry.declare('username', {
        validates: { presence: true, length: { minimum: 3, maximum: 20 } },
        writer,
      });

      expect(() => registry.set('username', 'ab')).toThrow(
        'Username is too short (minimum is 3 characters)'
      );
      expect(writer).not.toHaveBeenCalled();

      registry.set('username', 'john');
      expect(writer).toHaveBeenCalledWith('USERNAME', 'john', registry.spec('username'));
    });

    it('should report invalid values before read-only', () => {
      const registry = registryWith({});
      registry.declare('username', { validates: { presence: true } });

      expect(() => registry.set('username', '')).toThrow(ValidationError);
      expect(() => registry.set('username', 'john')).toThrow(ReadOnlyError);
    });

    it('should accept default writers registered after declaration', () => {
      const writer = vi.fn();
      const registry = registryWith({});
      registry.declare('region');

      expect(registry.isWritable('region')).toBe(false);
      registry.defaultWriter(writer);

      expect(registry.isWritable('region')).toBe(true);
      registry.set('region', 'eu');
      expect(writer).toHaveBeenCalledWith('REGION', 'eu', registry.spec('region'));
    });
  });

  describe('validateAll', () => {
    it('should pass when every variable is valid', () => {
      const registry = registryWith({ USERNAME: 'john' });
      registry.declare('username', { validates: { presence: true } });
      registry.declare('optional_note');

      expect(() => registry.validateAll()).not.toThrow();
    });

    it('should report every violation at once', () => {
      const registry = registryWith({ USERNAME: 'ab', API_KEY: 'short' });
      registry.declare('database_url', { validates: { presence: true } });
      registry.declare('username', { validates: { length: { minimum: 3 } } });
      registry.declare('api_key', { validates: { length: { is: 32 } } });

      let caught: unknown;
      try {
        registry.validateAll();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (!(caught instanceof ValidationError)) return;

      expect(caught.messages).toEqual([
        "Database url can't be blank",
        'Username is too short (minimum is 3 characters)',
        'Api key is the wrong length (should be 32 characters)',
      ]);
      expect(caught.message).toBe(
        "Database url can't be blank, Username is too short (minimum is 3 characters), Api key is the wrong length (should be 32 characters)"
      );
      expect(caught.variables).toEqual(['database_url', 'username', 'api_key']);
    });

    it('should match coerced arrays and maps against their lists', () => {
      const registry = registryWith(
        { HOSTS: 'a,b', OPTS: '{"x":1}' },
        { validationEngine: new ZodValidationEngine() }
      );
      registry.declare('hosts', { type: 'array', validates: { inclusion: [['a', 'b']] } });
      registry.declare('opts', { type: 'map', validates: { inclusion: [{ x: 1 }] } });

      expect(() => registry.validateAll()).not.toThrow();
    });

    it('should validate the coerced value', () => {
      const registry = registryWith({ ENVIRONMENT: 'staging' });
      registry.declare('environment', {
        type: 'symbol',
        validates: { inclusion: [Symbol.for('development'), Symbol.for('production')] },
      });

      expect(() => registry.validateAll()).toThrow('Environment is not included in the list');
    });
  });

  describe('validate', () => {
    it('should measure multi-unit characters as one', () => {
      const registry = registryWith({ NAME: '😀😀😀' });
      registry.declare('name', { validates: { length: { maximum: 3 } } });

      expect(registry.validate('name')).toEqual([]);
    });

    it('should return full messages for one variable', () => {
      const registry = registryWith({ USERNAME: '' });
      registry.declare('username', { validates: { presence: true } });
      registry.declare('port', { type: 'integer', default: 3000 });

      expect(registry.validate('username')).toEqual(["Username can't be blank"]);
      expect(registry.validate('port')).toEqual([]);
    });
  });

  describe('with the zod engine', () => {
    it('should evaluate numericality on coerced values', () => {
      const registry = registryWith({ AGE: '0' }, { validationEngine: new ZodValidationEngine() });
      registry.declare('age', { type: 'integer', validates: { numericality: { greaterThan: 0 } } });

      expect(registry.validate('age')).toEqual(['Age must be greater than 0']);
    });

    it('should compare against other variables', () => {
      const registry = registryWith(
        { MIN_VALUE: '50', MAX_VALUE: '10' },
        { validationEngine: new ZodValidationEngine() }
      );
      registry.declare('min_value', { type: 'integer' });
      registry.declare('max_value', {
        type: 'integer',
        validates: { comparison: { greaterThan: 'min_value' } },
      });

      expect(registry.validate('max_value')).toEqual(['Max value must be greater than 50']);
    });

    it('should report absence and exclusion', () => {
      const registry = registryWith(
        { LEGACY_FIELD: 'set', USERNAME: 'admin' },
        { validationEngine: new ZodValidationEngine() }
      );
      registry.declare('legacy_field', { validates: { absence: true } });
      registry.declare('username', { validates: { exclusion: ['admin', 'root'] } });

      expect(() => registry.validateAll()).toThrow('Legacy field must be blank, Username is reserved');
    });

    it('should use the configured engine', () => {
      configure((config) => {
        config.validationEngine = new ZodValidationEngine();
      });

      const registry = registryWith({});

      expect(registry.validationEngine.name).toBe('zod');
    });
  });

  describe('isPresent', () => {
    it('should report present values', () => {
      const registry = registryWith({ API_KEY: 'test-secret', EMPTY: '' });
      registry.declare('api_key');
      registry.declare('empty');
      registry.declare('missing');
      registry.declare('hosts', { type: 'array', default: [] });

      expect(registry.isPresent('api_key')).toBe(true);
      expect(registry.isPresent('empty')).toBe(false);
      expect(registry.isPresent('missing')).toBe(false);
      expect(registry.isPresent('hosts')).toBe(false);
    });
  });

  describe('enumerate', () => {
    it('should snapshot every variable in declaration order', () => {
      const registry = registryWith({ PORT: '8080', DEBUG: 'yes' });
      registry.declare('port', { type: 'integer', default: 3000 });
      registry.declare('debug', { type: 'boolean', default: false });
      registry.declare('timeout', { type: 'float', default: 1.5 });

      const snapshot = registry.enumerate();

      expect(snapshot).toEqual({ port: 8080, debug: true, timeout: 1.5 });
      expect(Object.keys(snapshot)).toEqual(['port', 'debug', 'timeout']);
      expect(JSON.stringify(registry)).toBe('{"port":8080,"debug":true,"timeout":1.5}');
    });
  });

  describe('logging', () => {
    it('should log operations without values', () => {
      const { logger, lines } = collectingLogger();
      const registry = new Registry({ logger, environment: { API_KEY: 'test-secret' } });

      registry.declare('api_key', { writer: vi.fn() });
      registry.get('api_key');
      registry.set('api_key', 'test-secret');

      expect(lines).toEqual([
        '[declare] api_key: declared',
        '[get] api_key: resolved',
        '[set] api_key: written',
      ]);
    });

    it('should log denied writes and failed validation at warn', () => {
      const { logger, lines } = collectingLogger('warn');
      const registry = new Registry({ logger, environment: {} });
      registry.declare('database_url', { validates: { presence: true } });

      expect(() => registry.get('database_url')).not.toThrow();
      expect(() => registry.validateAll()).toThrow(ValidationError);
      expect(() => registry.set('database_url', 'postgres://localhost/test')).toThrow(ReadOnlyError);

      expect(lines).toEqual(['[validate] invalid', '[set] database_url: denied']);
    });
  });

  it('should be created by createRegistry', () => {
    expect(createRegistry({ logger: quiet() })).toBeInstanceOf(Registry);
  });
});
