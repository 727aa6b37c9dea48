// Schema types - named schema families and their immutable versions

import type { NumericId, Timestamp } from './common.js';

/**
 * Evolution rule governing which new versions may be appended.
 *
 * - NONE: any new version is accepted
 * - BACKWARD: the new version can read data written with the previous version
 * - FORWARD: readers of the previous version can read data written with the new one
 * - BOTH: BACKWARD and FORWARD against the previous version
 * - FULL: BOTH against every existing version
 */
export type SchemaCompatibility = 'NONE' | 'BACKWARD' | 'FORWARD' | 'BOTH' | 'FULL';

export const SCHEMA_COMPATIBILITIES: readonly SchemaCompatibility[] = [
  'NONE',
  'BACKWARD',
  'FORWARD',
  'BOTH',
  'FULL',
];

/**
 * Direction of a single compatibility check.
 * 'backward' means the new schema reads data written with the old one;
 * 'forward' means the old schema reads data written with the new one.
 */
export type CompatibilityDirection = 'backward' | 'forward';

export type SchemaMetadataId = NumericId;

/**
 * Name-based identity of a schema family
 */
export type SchemaMetadataKey = {
  name: string;
};

/**
 * Either form of schema family identity. Both resolve to the same record.
 */
export type SchemaMetadataRef = SchemaMetadataId | SchemaMetadataKey;

/**
 * The named, typed, policy-bearing identity of a schema family.
 */
export type SchemaMetadata = {
  /**
   * Unique name (e.g. "com.example.device.reading")
   */
  name: string;

  /**
   * Schema type; selects the provider that validates and compares texts
   */
  type: string;

  compatibility: SchemaCompatibility;

  /**
   * Whether versions beyond the first may be added
   */
  evolve: boolean;

  description?: string;
};

/**
 * A stored schema family record.
 */
export type SchemaMetadataInfo = SchemaMetadata & {
  id: SchemaMetadataId;
  createdAt: Timestamp;
};

/**
 * Identity of one schema version: metadata id plus 1-indexed version number.
 */
export type SchemaKey = {
  schemaMetadataId: SchemaMetadataId;
  version: number;
};

/**
 * A candidate schema text submitted as a new version.
 */
export type VersionedSchema = {
  schemaText: string;
  description?: string;
};

/**
 * An immutable schema version in the ledger.
 */
export type SchemaVersionInfo = {
  schemaKey: SchemaKey;
  schemaText: string;

  /**
   * Hex SHA-256 of the canonical form of schemaText
   */
  fingerprint: string;

  description?: string;
  createdAt: Timestamp;
};

// -----------------------------------------------------------------------------
// Utility functions
// -----------------------------------------------------------------------------

/**
 * Check whether a reference is the numeric id form
 */
export function isSchemaMetadataId(ref: SchemaMetadataRef): ref is SchemaMetadataId {
  return typeof ref === 'number';
}

/**
 * Render a reference for messages and logs
 */
export function formatSchemaMetadataRef(ref: SchemaMetadataRef): string {
  return isSchemaMetadataId(ref) ? `#${ref}` : `"${ref.name}"`;
}

/**
 * Render a schema key as "id:version"
 */
export function formatSchemaKey(key: SchemaKey): string {
  return `${key.schemaMetadataId}:${key.version}`;
}

/**
 * Directions a policy checks, and whether it checks every prior version
 * or only the latest one.
 */
export function compatibilityChecks(
  compatibility: SchemaCompatibility
): { directions: CompatibilityDirection[]; allVersions: boolean } {
  switch (compatibility) {
    case 'NONE':
      return { directions: [], allVersions: false };
    case 'BACKWARD':
      return { directions: ['backward'], allVersions: false };
    case 'FORWARD':
      return { directions: ['forward'], allVersions: false };
    case 'BOTH':
      return { directions: ['backward', 'forward'], allVersions: false };
    case 'FULL':
      return { directions: ['backward', 'forward'], allVersions: true };
  }
}

/**
 * Metadata as a caller submits it. Omitted settings are filled with
 * registry defaults on creation and ignored when matching an existing record.
 */
export type SchemaMetadataRequest = Pick<SchemaMetadata, 'name' | 'type'> &
  Partial<Pick<SchemaMetadata, 'compatibility' | 'evolve' | 'description'>>;

/**
 * Check that a stored record agrees with every setting the request supplies
 */
export function matchesSchemaMetadata(
  existing: SchemaMetadata,
  requested: SchemaMetadataRequest
): boolean {
  return (
    existing.name === requested.name &&
    existing.type === requested.type &&
    (requested.compatibility === undefined || existing.compatibility === requested.compatibility) &&
    (requested.evolve === undefined || existing.evolve === requested.evolve) &&
    (requested.description === undefined ||
      (existing.description ?? '') === requested.description)
  );
}
