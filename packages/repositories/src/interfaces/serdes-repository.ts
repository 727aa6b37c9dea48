import type {
  SchemaMetadataId,
  SerDesDescriptor,
  SerDesId,
  SerDesInfo,
  SerDesRole,
} from '@schemata/protocol';

/**
 * Repository interface for serializer/deserializer descriptors and their
 * associations with schema families.
 *
 * Descriptors are never deduplicated. Associations form a set: mapping the
 * same pair twice leaves one edge.
 */
export interface SerDesRepository {
  /**
   * Create a descriptor with a freshly assigned id
   */
  create(descriptor: SerDesDescriptor, role: SerDesRole): Promise<SerDesInfo>;

  /**
   * Get a descriptor by id
   * @returns Descriptor or null if not found
   */
  get(id: SerDesId): Promise<SerDesInfo | null>;

  /**
   * Associate a descriptor with a schema family.
   * Both ids must exist; the caller checks.
   */
  map(schemaMetadataId: SchemaMetadataId, serDesId: SerDesId): Promise<void>;

  /**
   * Descriptors of the given role mapped to a schema family, ordered by id
   */
  listForSchema(schemaMetadataId: SchemaMetadataId, role: SerDesRole): Promise<SerDesInfo[]>;
}
