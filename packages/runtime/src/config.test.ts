// Tests for configuration loading

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfigFromEnv, resolveConfig } from './config.js';
import { ValidationError } from './errors.js';

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG).toEqual({
      defaultCompatibility: 'BACKWARD',
      maxRegistrationAttempts: 5,
      databaseUrl: null,
      maxConnections: 10,
      fileStorageDir: null,
      logLevel: 'info',
    });
  });

  it('keeps overrides', () => {
    expect(resolveConfig({ maxRegistrationAttempts: 2 }).maxRegistrationAttempts).toBe(2);
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveConfig({ maxRegistrationAttempts: 0 })).toThrow(ValidationError);
    expect(() => resolveConfig({ maxConnections: 1.5 })).toThrow(/maxConnections/);
  });
});

describe('loadConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads registry variables', () => {
    const config = loadConfigFromEnv({
      SCHEMA_REGISTRY_DEFAULT_COMPATIBILITY: 'full',
      SCHEMA_REGISTRY_MAX_REGISTRATION_ATTEMPTS: '8',
      SCHEMA_REGISTRY_DATABASE_URL: 'postgres://localhost:5432/registry',
      SCHEMA_REGISTRY_PGPOOL_MAX: '4',
      SCHEMA_REGISTRY_FILE_STORAGE_DIR: '/var/lib/registry/files',
      SCHEMA_REGISTRY_LOG_LEVEL: 'DEBUG',
    });

    expect(config).toEqual({
      defaultCompatibility: 'FULL',
      maxRegistrationAttempts: 8,
      databaseUrl: 'postgres://localhost:5432/registry',
      maxConnections: 4,
      fileStorageDir: '/var/lib/registry/files',
      logLevel: 'debug',
    });
  });

  it('falls back to DATABASE_URL', () => {
    expect(loadConfigFromEnv({ DATABASE_URL: 'postgres://db/app' }).databaseUrl).toBe('postgres://db/app');
    expect(
      loadConfigFromEnv({ DATABASE_URL: 'postgres://db/app', SCHEMA_REGISTRY_DATABASE_URL: 'postgres://db/reg' })
        .databaseUrl
    ).toBe('postgres://db/reg');
  });

  it('treats blank values as unset', () => {
    const config = loadConfigFromEnv({ SCHEMA_REGISTRY_FILE_STORAGE_DIR: '  ', DATABASE_URL: '' });

    expect(config.fileStorageDir).toBeNull();
    expect(config.databaseUrl).toBeNull();
  });

  it('ignores unparseable numbers', () => {
    expect(loadConfigFromEnv({ SCHEMA_REGISTRY_MAX_REGISTRATION_ATTEMPTS: 'many' }).maxRegistrationAttempts).toBe(5);
  });

  it('keeps the default log level for unknown names', () => {
    expect(loadConfigFromEnv({ SCHEMA_REGISTRY_LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
  });

  it('rejects unknown compatibility policies', () => {
    expect(() => loadConfigFromEnv({ SCHEMA_REGISTRY_DEFAULT_COMPATIBILITY: 'SOMETIMES' })).toThrow(
      'Unknown compatibility policy: SOMETIMES'
    );
  });
});
