// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  SchemaMetadataRepository,
  CreateSchemaMetadataInput,
  SchemaMetadataFilter,
} from './schema-metadata-repository.js';

export type {
  SchemaVersionRepository,
  AppendSchemaVersionInput,
} from './schema-version-repository.js';

export type { SerDesRepository } from './serdes-repository.js';

export type { RepositoryContext } from './repository-context.js';
