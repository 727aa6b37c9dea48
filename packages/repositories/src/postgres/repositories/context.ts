import type { Database } from '../db.js';
import type { RepositoryContext } from '../../interfaces/index.js';
import { PgSchemaMetadataRepository } from './schema-metadata-repository.js';
import { PgSchemaVersionRepository } from './schema-version-repository.js';
import { PgSerDesRepository } from './serdes-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * // Now use repos.metadata, repos.versions, repos.serdes
 * const record = await repos.metadata.getByName('device.reading');
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    metadata: new PgSchemaMetadataRepository(db),
    versions: new PgSchemaVersionRepository(db),
    serdes: new PgSerDesRepository(db),
  };
}
