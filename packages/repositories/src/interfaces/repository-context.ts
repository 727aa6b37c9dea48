import type { SchemaMetadataRepository } from './schema-metadata-repository.js';
import type { SchemaVersionRepository } from './schema-version-repository.js';
import type { SerDesRepository } from './serdes-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to the registry and you can swap
 * implementations (Postgres, in-memory, etc.) without changing it.
 *
 * Example usage:
 * ```typescript
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const registry = createSchemaRegistry({ repos: createPgRepositoryContext(db), files });
 * ```
 */
export interface RepositoryContext {
  readonly metadata: SchemaMetadataRepository;
  readonly versions: SchemaVersionRepository;
  readonly serdes: SerDesRepository;
}

