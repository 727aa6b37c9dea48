// Registry error types

import type {
  CompatibilityDirection,
  FileId,
  SchemaKey,
  SchemaMetadata,
  SchemaMetadataRequest,
  SerDesId,
  SerDesRole,
} from '@schemata/protocol';
import { formatSchemaKey } from '@schemata/protocol';

/**
 * Base class for all registry errors.
 * Provides structured error information for debugging and logging.
 */
export class RegistryError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistryError';
    this.code = code;
  }
}

// --- Not found ---

/**
 * Base class for lookups that resolved nothing. Always recoverable by
 * choosing another id or registering first.
 */
export class NotFoundError extends RegistryError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = 'NotFoundError';
  }
}

/**
 * Error when a schema family does not exist.
 */
export class SchemaMetadataNotFoundError extends NotFoundError {
  readonly ref: string;

  constructor(ref: string) {
    super('SCHEMA_METADATA_NOT_FOUND', `Schema metadata not found: ${ref}`);
    this.name = 'SchemaMetadataNotFoundError';
    this.ref = ref;
  }
}

/**
 * Error when a schema family exists but the requested version does not,
 * or the family has no versions yet.
 */
export class SchemaVersionNotFoundError extends NotFoundError {
  readonly schemaKey?: SchemaKey;

  constructor(message: string, schemaKey?: SchemaKey) {
    super('SCHEMA_VERSION_NOT_FOUND', message);
    this.name = 'SchemaVersionNotFoundError';
    this.schemaKey = schemaKey;
  }

  static forKey(schemaKey: SchemaKey): SchemaVersionNotFoundError {
    return new SchemaVersionNotFoundError(
      `Schema version not found: ${formatSchemaKey(schemaKey)}`,
      schemaKey
    );
  }
}

/**
 * Error when an uploaded file id is unknown.
 */
export class FileNotFoundError extends NotFoundError {
  readonly fileId: FileId;

  constructor(fileId: FileId) {
    super('FILE_NOT_FOUND', `File not found: ${fileId}`);
    this.name = 'FileNotFoundError';
    this.fileId = fileId;
  }
}

/**
 * Error when a serializer/deserializer id is unknown.
 */
export class SerDesNotFoundError extends NotFoundError {
  readonly serDesId: SerDesId;

  constructor(serDesId: SerDesId) {
    super('SERDES_NOT_FOUND', `SerDes not found: ${serDesId}`);
    this.name = 'SerDesNotFoundError';
    this.serDesId = serDesId;
  }
}

// --- Validation ---

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RegistryError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; code?: string }
  ) {
    super(options?.code ?? 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when schema text is not well-formed for its type, or the type
 * has no provider. Never retried automatically.
 */
export class InvalidSchemaError extends ValidationError {
  readonly schemaType: string;

  constructor(schemaType: string, reason: string) {
    super(`Invalid ${schemaType} schema: ${reason}`, {
      code: 'INVALID_SCHEMA',
      field: 'schemaText',
      details: { schemaType, reason },
    });
    this.name = 'InvalidSchemaError';
    this.schemaType = schemaType;
  }
}

// --- Compatibility ---

/**
 * One failed check of a candidate against an existing version
 */
export type CompatibilityFailure = {
  version: number;
  direction: CompatibilityDirection;
};

export type IncompatibilityReason = 'incompatible' | 'evolution_disabled';

/**
 * Error when a candidate fails compatibility evaluation. Lists every
 * (version, direction) pair that failed. The ledger is unchanged.
 */
export class IncompatibleSchemaError extends RegistryError {
  readonly schemaName: string;
  readonly reason: IncompatibilityReason;
  readonly failures: CompatibilityFailure[];

  constructor(schemaName: string, failures: CompatibilityFailure[], reason: IncompatibilityReason = 'incompatible') {
    const summary =
      reason === 'evolution_disabled'
        ? 'schema does not allow new versions'
        : failures.map((f) => `${f.direction} against version ${f.version}`).join(', ');
    super('INCOMPATIBLE_SCHEMA', `Schema "${schemaName}" rejected: ${summary}`);
    this.name = 'IncompatibleSchemaError';
    this.schemaName = schemaName;
    this.reason = reason;
    this.failures = failures;
  }
}

// --- Conflicts ---

/**
 * Error when metadata is registered under an existing name with different
 * content. The stored record is left as it was.
 */
export class SchemaMetadataConflictError extends RegistryError {
  readonly existing: SchemaMetadata;
  readonly requested: SchemaMetadataRequest;

  constructor(existing: SchemaMetadata, requested: SchemaMetadataRequest) {
    super(
      'SCHEMA_METADATA_CONFLICT',
      `Schema metadata "${requested.name}" already exists with different settings`
    );
    this.name = 'SchemaMetadataConflictError';
    this.existing = existing;
    this.requested = requested;
  }
}

/**
 * Error when every optimistic append attempt lost a race for its version
 * slot. The outcome is safe to retry.
 */
export class RegistrationConflictError extends RegistryError {
  readonly schemaName: string;
  readonly attempts: number;

  constructor(schemaName: string, attempts: number) {
    super(
      'REGISTRATION_CONFLICT',
      `Could not append a version to "${schemaName}" after ${attempts} attempts`
    );
    this.name = 'RegistrationConflictError';
    this.schemaName = schemaName;
    this.attempts = attempts;
  }
}

// --- Instantiation ---

export type InstantiationFailureReason =
  | 'missing_binary'
  | 'class_not_found'
  | 'construction_failed'
  | 'capability_mismatch'
  | 'role_mismatch';

/**
 * Error when a serializer/deserializer cannot be turned into an instance.
 * Fatal for the call; not retried.
 */
export class InstantiationError extends RegistryError {
  readonly serDesId: SerDesId;
  readonly className: string;
  readonly role: SerDesRole;
  readonly reason: InstantiationFailureReason;

  constructor(
    target: { serDesId: SerDesId; className: string; role: SerDesRole },
    reason: InstantiationFailureReason,
    detail: string,
    cause?: unknown
  ) {
    super(
      'INSTANTIATION_ERROR',
      `Cannot create ${target.role} ${target.className} (${target.serDesId}): ${detail}`,
      { cause }
    );
    this.name = 'InstantiationError';
    this.serDesId = target.serDesId;
    this.className = target.className;
    this.role = target.role;
    this.reason = reason;
  }
}
