// Registry configuration and environment loading

import { z } from 'zod';
import { SchemaCompatibilitySchema, type SchemaCompatibility } from '@schemata/protocol';
import { ValidationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logging.js';

const configSchema = z.object({
  defaultCompatibility: SchemaCompatibilitySchema,
  maxRegistrationAttempts: z.number().int().positive(),
  databaseUrl: z.string().min(1).nullable(),
  maxConnections: z.number().int().positive(),
  fileStorageDir: z.string().min(1).nullable(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
});

/**
 * Fully resolved registry configuration.
 *
 * A null databaseUrl keeps metadata and versions in memory; a null
 * fileStorageDir keeps uploaded files in memory.
 */
export type SchemaRegistryConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: SchemaRegistryConfig = {
  defaultCompatibility: 'BACKWARD',
  maxRegistrationAttempts: 5,
  databaseUrl: null,
  maxConnections: 10,
  fileStorageDir: null,
  logLevel: 'info',
};

/**
 * Fill in defaults and check the result.
 *
 * @throws ValidationError if a value is out of range
 */
export function resolveConfig(overrides: Partial<SchemaRegistryConfig> = {}): SchemaRegistryConfig {
  const parsed = configSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid registry configuration: ${field}: ${issue.message}`, {
      code: 'INVALID_CONFIG',
      field,
    });
  }
  return parsed.data;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseCompatibility(value: string | undefined, fallback: SchemaCompatibility): SchemaCompatibility {
  if (!value) {
    return fallback;
  }
  const parsed = SchemaCompatibilitySchema.safeParse(value.trim().toUpperCase());
  if (!parsed.success) {
    throw new ValidationError(`Unknown compatibility policy: ${value}`, {
      code: 'INVALID_CONFIG',
      field: 'defaultCompatibility',
    });
  }
  return parsed.data;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Load configuration from environment variables.
 *
 * - SCHEMA_REGISTRY_DEFAULT_COMPATIBILITY: NONE | BACKWARD | FORWARD | BOTH | FULL
 * - SCHEMA_REGISTRY_MAX_REGISTRATION_ATTEMPTS
 * - SCHEMA_REGISTRY_DATABASE_URL, falling back to DATABASE_URL
 * - SCHEMA_REGISTRY_PGPOOL_MAX
 * - SCHEMA_REGISTRY_FILE_STORAGE_DIR
 * - SCHEMA_REGISTRY_LOG_LEVEL: debug | info | warn | error
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SchemaRegistryConfig {
  return resolveConfig({
    defaultCompatibility: parseCompatibility(
      env.SCHEMA_REGISTRY_DEFAULT_COMPATIBILITY,
      DEFAULT_CONFIG.defaultCompatibility
    ),
    maxRegistrationAttempts: parseNumber(
      env.SCHEMA_REGISTRY_MAX_REGISTRATION_ATTEMPTS,
      DEFAULT_CONFIG.maxRegistrationAttempts
    ),
    databaseUrl: nonEmpty(env.SCHEMA_REGISTRY_DATABASE_URL) ?? nonEmpty(env.DATABASE_URL),
    maxConnections: parseNumber(env.SCHEMA_REGISTRY_PGPOOL_MAX, DEFAULT_CONFIG.maxConnections),
    fileStorageDir: nonEmpty(env.SCHEMA_REGISTRY_FILE_STORAGE_DIR),
    logLevel: parseLogLevel(env.SCHEMA_REGISTRY_LOG_LEVEL, DEFAULT_CONFIG.logLevel),
  });
}
