/**
 * Naming Tests
 */

import { describe, it, expect } from 'vitest';
import { displayNameFor, storageKeyFor } from './naming.js';

describe('storageKeyFor', () => {
  it('should upper-case the name', () => {
    expect(storageKeyFor('database_url')).toBe('DATABASE_URL');
    expect(storageKeyFor('port')).toBe('PORT');
  });

  it('should keep every other character', () => {
    expect(storageKeyFor('api-key.v2')).toBe('API-KEY.V2');
  });
});

describe('displayNameFor', () => {
  it('should humanize snake_case names', () => {
    expect(displayNameFor('database_url')).toBe('Database url');
    expect(displayNameFor('legacy_field')).toBe('Legacy field');
  });

  it('should humanize camelCase names', () => {
    expect(displayNameFor('maxValue')).toBe('Max value');
  });

  it('should capitalize single words', () => {
    expect(displayNameFor('age')).toBe('Age');
  });

  it('should collapse repeated separators', () => {
    expect(displayNameFor('__cache--ttl')).toBe('Cache ttl');
  });
});
