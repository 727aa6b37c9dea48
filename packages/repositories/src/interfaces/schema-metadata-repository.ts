import type {
  SchemaCompatibility,
  SchemaMetadataId,
  SchemaMetadataInfo,
} from '@schemata/protocol';

/**
 * Input for creating a schema metadata record.
 * All fields are resolved; defaults are applied by the caller.
 */
export type CreateSchemaMetadataInput = {
  name: string;
  type: string;
  compatibility: SchemaCompatibility;
  evolve: boolean;
  description?: string;
};

/**
 * Filter for listing schema metadata
 */
export type SchemaMetadataFilter = {
  type?: string;
  namePrefix?: string;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for schema metadata (the identity store).
 *
 * Each record maps a unique name to a numeric id that never changes for
 * the lifetime of the record. Records are immutable once created.
 */
export interface SchemaMetadataRepository {
  /**
   * Create a record with a freshly assigned id.
   * @returns The new record, or null if the name is already taken
   */
  create(input: CreateSchemaMetadataInput): Promise<SchemaMetadataInfo | null>;

  /**
   * Get a record by id
   * @returns Record or null if not found
   */
  get(id: SchemaMetadataId): Promise<SchemaMetadataInfo | null>;

  /**
   * Get a record by its unique name
   * @returns Record or null if not found
   */
  getByName(name: string): Promise<SchemaMetadataInfo | null>;

  /**
   * List records ordered by id
   */
  list(filter?: SchemaMetadataFilter): Promise<SchemaMetadataInfo[]>;
}
