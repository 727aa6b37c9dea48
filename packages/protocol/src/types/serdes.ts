// SerDes types - serializer/deserializer descriptors and runtime capabilities
//
// A descriptor points at an uploaded file and names the class inside it.
// The runtime turns a descriptor into an instance that satisfies one of the
// capability interfaces below.

import type { FileId, NumericId, Timestamp } from './common.js';
import type { SchemaMetadataInfo, SchemaVersionInfo } from './schemas.js';

export type SerDesRole = 'serializer' | 'deserializer';

export type SerDesId = NumericId;

/**
 * Input for registering a serializer or deserializer.
 */
export type SerDesDescriptor = {
  name: string;
  description?: string;

  /**
   * Uploaded file holding the implementation
   */
  fileId: FileId;

  /**
   * Name of the class to construct from the file
   */
  className: string;
};

/**
 * A stored serializer/deserializer descriptor.
 */
export type SerDesInfo = SerDesDescriptor & {
  id: SerDesId;
  role: SerDesRole;
  createdAt: Timestamp;
};

/**
 * Context passed to a serializer or deserializer alongside the payload
 */
export type SerDesSchemaContext = {
  metadata: SchemaMetadataInfo;
  version: SchemaVersionInfo;
};

/**
 * Capability of a constructed serializer
 */
export interface SchemaSerializer<TInput = unknown> {
  init?(config: Record<string, unknown>): void;
  serialize(input: TInput, schema: SerDesSchemaContext): Uint8Array;
  close?(): void;
}

/**
 * Capability of a constructed deserializer
 */
export interface SchemaDeserializer<TOutput = unknown> {
  init?(config: Record<string, unknown>): void;
  deserialize(payload: Uint8Array, schema: SerDesSchemaContext): TOutput;
  close?(): void;
}

/**
 * Check whether a value satisfies the serializer capability
 */
export function isSchemaSerializer(value: unknown): value is SchemaSerializer {
  return (
    typeof value === 'object' &&
    value !== null &&
    'serialize' in value &&
    typeof value.serialize === 'function'
  );
}

/**
 * Check whether a value satisfies the deserializer capability
 */
export function isSchemaDeserializer(value: unknown): value is SchemaDeserializer {
  return (
    typeof value === 'object' &&
    value !== null &&
    'deserialize' in value &&
    typeof value.deserialize === 'function'
  );
}
