/**
 * Basic Settings Example
 *
 * Declares application settings over process.env, a JSON file store and an
 * in-memory cache, then validates them in one pass at boot.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import {
  Registry,
  Settings,
  ValidationError,
  ReadOnlyError,
  defineSettings,
  variable,
} from '../src/index.js';

// =============================================================================
// Example 1: Environment-backed registry
// =============================================================================

const settings = new Registry();

settings.declare('port', { type: 'integer', default: 3000 });
settings.declare('debug', { type: 'boolean', default: false });
settings.declare('allowed_hosts', { type: 'array', default: [] });
settings.declare('database_url', {
  validates: { presence: true, format: /^postgres:\/\// },
  description: 'Primary database connection string',
});

try {
  settings.validateAll();
} catch (error) {
  if (error instanceof ValidationError) {
    console.error('Invalid configuration:');
    for (const message of error.messages) {
      console.error(`  - ${message}`);
    }
  } else {
    throw error;
  }
}

console.log('port:', settings.get('port'));
console.log('allowed hosts:', settings.get('allowed_hosts'));

try {
  settings.set('port', 8080);
} catch (error) {
  if (!(error instanceof ReadOnlyError)) throw error;
  console.log(error.message);
}

// =============================================================================
// Example 2: File-backed variables
// =============================================================================

const STORE_PATH = './settings.local.json';

function readStore(): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(readFileSync(STORE_PATH, 'utf8'));
    return typeof parsed === 'object' && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
  } catch {
    return {};
  }
}

const fileBacked = new Registry({
  defaultReader: (key) => readStore()[key],
  defaultWriter: (key, value) => {
    writeFileSync(STORE_PATH, JSON.stringify({ ...readStore(), [key]: value }, null, 2));
  },
});

fileBacked.declare('feature_flags', { type: 'map', default: {} });
fileBacked.set('feature_flags', { newCheckout: true });
console.log('feature flags:', fileBacked.get('feature_flags'));

// =============================================================================
// Example 3: Typed accessors
// =============================================================================

const cache = new Map<string, unknown>();

const { accessors } = defineSettings(
  {
    region: variable('string', { default: 'eu-west-1' }),
    maintenance: variable('boolean', { default: false }),
  },
  {
    defaultReader: (key) => cache.get(key),
    defaultWriter: (key, value) => cache.set(key, value),
  }
);

accessors.maintenance.set(true);
console.log('region:', accessors.region.get());
console.log('maintenance:', accessors.maintenance.isEnabled());

// =============================================================================
// Example 4: Settings subclass
// =============================================================================

class MailerSettings extends Settings {
  static override variables = {
    smtp_host: variable('string', { validates: { presence: true } }),
    smtp_port: variable('integer', { default: 587 }),
  };
}

console.log('mailer:', MailerSettings.all());
