import type { SchemaKey, SchemaMetadataId, SchemaVersionInfo } from '@schemata/protocol';

/**
 * Input for appending a version to the ledger
 */
export type AppendSchemaVersionInput = {
  schemaMetadataId: SchemaMetadataId;
  version: number;
  schemaText: string;
  fingerprint: string;
  description?: string;
};

/**
 * Repository interface for the version ledger.
 *
 * Versions of one schema family form an append-only, gap-free sequence
 * starting at 1. Entries are never updated or deleted.
 *
 * The ledger does not check compatibility. Only the registration protocol
 * appends; nothing else should call append directly.
 */
export interface SchemaVersionRepository {
  /**
   * Atomically append a version if its slot is free.
   *
   * Returns null, and stores nothing, when the version number is already
   * taken or another version of the same family has the same fingerprint.
   * Callers that lose the race re-read the ledger and retry.
   */
  append(input: AppendSchemaVersionInput): Promise<SchemaVersionInfo | null>;

  /**
   * Get a specific version
   * @returns Version or null if not found
   */
  get(key: SchemaKey): Promise<SchemaVersionInfo | null>;

  /**
   * Get the highest version of a schema family
   * @returns Version or null if the family has no versions
   */
  getLatest(schemaMetadataId: SchemaMetadataId): Promise<SchemaVersionInfo | null>;

  /**
   * List all versions, ascending by version number
   */
  list(schemaMetadataId: SchemaMetadataId): Promise<SchemaVersionInfo[]>;

  /**
   * Find the version of a family with the given fingerprint
   */
  findByFingerprint(
    schemaMetadataId: SchemaMetadataId,
    fingerprint: string
  ): Promise<SchemaVersionInfo | null>;
}
