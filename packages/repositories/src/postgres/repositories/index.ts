// Postgres repository implementations
export { PgSchemaMetadataRepository } from './schema-metadata-repository.js';
export { PgSchemaVersionRepository } from './schema-version-repository.js';
export { PgSerDesRepository } from './serdes-repository.js';
export { createPgRepositoryContext } from './context.js';
