// Wire a SchemaRegistry from configuration

import {
  createFilesystemFileStorage,
  createInMemoryFileStorage,
  createInMemoryRepositoryContext,
  postgres,
  type FileStorage,
  type RepositoryContext,
} from '@schemata/repositories';
import { resolveConfig, type SchemaRegistryConfig } from './config.js';
import { createConsoleLogger, type RegistryLogger } from './logging.js';
import type { SchemaProviderRegistry } from './providers/registry.js';
import { createSchemaRegistry, type SchemaRegistry } from './registry.js';
import type { ClassLoader } from './serdes/class-loader.js';

export type BootstrapOptions = {
  /**
   * Defaults to a console logger at the configured logLevel
   */
  logger?: RegistryLogger;
  providers?: SchemaProviderRegistry;
  classLoader?: ClassLoader;
};

/**
 * Build a registry from configuration.
 *
 * With a databaseUrl, metadata, versions and serdes live in Postgres and
 * close() ends the connection pool; without one they live in memory.
 * With a fileStorageDir, uploads are written there; without one they live
 * in memory.
 *
 * @example
 * ```typescript
 * const registry = bootstrapSchemaRegistry(loadConfigFromEnv());
 * // ...
 * await registry.close();
 * ```
 */
export function bootstrapSchemaRegistry(
  config: Partial<SchemaRegistryConfig> = {},
  options: BootstrapOptions = {}
): SchemaRegistry {
  const resolved = resolveConfig(config);
  const logger = options.logger ?? createConsoleLogger({ level: resolved.logLevel });

  let repos: RepositoryContext;
  let onClose: (() => Promise<void>) | undefined;

  if (resolved.databaseUrl) {
    const database = postgres.createDatabase({
      connectionString: resolved.databaseUrl,
      maxConnections: resolved.maxConnections,
    });
    repos = postgres.createPgRepositoryContext(database.db);
    onClose = database.close;
  } else {
    repos = createInMemoryRepositoryContext();
  }

  const files: FileStorage = resolved.fileStorageDir
    ? createFilesystemFileStorage(resolved.fileStorageDir)
    : createInMemoryFileStorage();

  logger.info('Schema registry configured', {
    storage: resolved.databaseUrl ? 'postgres' : 'memory',
    files: resolved.fileStorageDir ?? 'memory',
    defaultCompatibility: resolved.defaultCompatibility,
  });

  return createSchemaRegistry({
    repos,
    files,
    providers: options.providers,
    classLoader: options.classLoader,
    logger,
    defaultCompatibility: resolved.defaultCompatibility,
    maxRegistrationAttempts: resolved.maxRegistrationAttempts,
    onClose,
  });
}
