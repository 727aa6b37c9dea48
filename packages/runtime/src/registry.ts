// SchemaRegistry - the client-visible service
//
// Every operation that takes a schema family accepts either its numeric id
// or a { name } key. Keys are resolved to ids first; there is a single code
// path per operation after that.

import { Readable } from 'node:stream';
import {
  formatSchemaMetadataRef,
  isNumericIdInRange,
  isSchemaDeserializer,
  isSchemaMetadataId,
  isSchemaSerializer,
  matchesSchemaMetadata,
  validateSchemaMetadataInput,
  validateSerDesDescriptor,
  validateVersionedSchema,
  type FileId,
  type InputValidationError,
  type InputValidationResult,
  type SchemaCompatibility,
  type SchemaDeserializer,
  type SchemaKey,
  type SchemaMetadata,
  type SchemaMetadataInfo,
  type SchemaMetadataInput,
  type SchemaMetadataRef,
  type SchemaMetadataRequest,
  type SchemaSerializer,
  type SchemaVersionInfo,
  type SerDesDescriptor,
  type SerDesId,
  type SerDesInfo,
  type SerDesRole,
  type VersionedSchema,
} from '@schemata/protocol';
import type {
  FileSource,
  FileStorage,
  RepositoryContext,
  SchemaMetadataFilter,
} from '@schemata/repositories';
import {
  FileNotFoundError,
  SchemaMetadataConflictError,
  SchemaMetadataNotFoundError,
  SchemaVersionNotFoundError,
  SerDesNotFoundError,
  ValidationError,
} from './errors.js';
import { isCompatibleWithAll } from './compatibility/evaluator.js';
import { DEFAULT_CONFIG } from './config.js';
import { silentLogger, type RegistryLogger } from './logging.js';
import { createDefaultProviderRegistry } from './providers/index.js';
import type { SchemaProviderRegistry } from './providers/registry.js';
import { KeyedLock } from './registration/lock.js';
import {
  prepareCandidate,
  registerOrReuse,
  registerPrepared,
  requireProvider,
  type RegistrationDeps,
} from './registration/register.js';
import { createModuleClassLoader, type ClassLoader } from './serdes/class-loader.js';
import { instantiateSerDes, type InstantiatorDeps } from './serdes/instantiator.js';

export type SchemaRegistryOptions = {
  repos: RepositoryContext;
  files: FileStorage;

  /**
   * Schema type providers (defaults to the built-in 'record' and 'text')
   */
  providers?: SchemaProviderRegistry;

  /**
   * Loader for serializer/deserializer binaries (defaults to CommonJS module source)
   */
  classLoader?: ClassLoader;

  logger?: RegistryLogger;

  /**
   * Policy for metadata registered without one
   */
  defaultCompatibility?: SchemaCompatibility;

  maxRegistrationAttempts?: number;

  /**
   * Called once by close() to release storage resources
   */
  onClose?: () => Promise<void>;
};

function firstErrorAsValidationError(errors: InputValidationError[]): ValidationError {
  const [first] = errors;
  return new ValidationError(first.message, { field: first.path, details: { errors } });
}

function requireValid<T>(result: InputValidationResult<T>): T {
  if (!result.valid) {
    throw firstErrorAsValidationError(result.errors);
  }
  return result.value;
}

export class SchemaRegistry {
  private readonly repos: RepositoryContext;
  private readonly files: FileStorage;
  private readonly providers: SchemaProviderRegistry;
  private readonly logger: RegistryLogger;
  private readonly defaultCompatibility: SchemaCompatibility;
  private readonly registration: RegistrationDeps;
  private readonly instantiator: InstantiatorDeps;
  private readonly onClose?: () => Promise<void>;
  private closed = false;

  constructor(options: SchemaRegistryOptions) {
    this.repos = options.repos;
    this.files = options.files;
    this.providers = options.providers ?? createDefaultProviderRegistry();
    this.logger = options.logger ?? silentLogger;
    this.defaultCompatibility = options.defaultCompatibility ?? DEFAULT_CONFIG.defaultCompatibility;
    this.onClose = options.onClose;

    this.registration = {
      repos: this.repos,
      providers: this.providers,
      lock: new KeyedLock(),
      logger: this.logger,
      maxAttempts: options.maxRegistrationAttempts ?? DEFAULT_CONFIG.maxRegistrationAttempts,
    };
    this.instantiator = {
      files: this.files,
      classLoader: options.classLoader ?? createModuleClassLoader(),
      logger: this.logger,
    };
  }

  // ---------------------------------------------------------------------------
  // Schema metadata
  // ---------------------------------------------------------------------------

  /**
   * Register a schema family.
   *
   * @returns true if a record was created, false if an identical one existed
   * @throws ValidationError if the input is malformed
   * @throws InvalidSchemaError if no provider handles the type
   * @throws SchemaMetadataConflictError if the name exists with other settings
   */
  async registerSchemaMetadata(metadata: SchemaMetadataInput): Promise<boolean> {
    const resolved = this.resolveMetadataInput(metadata);
    const { created } = await this.ensureMetadata(resolved);
    return created;
  }

  async listAllSchemas(filter?: SchemaMetadataFilter): Promise<SchemaMetadataInfo[]> {
    return this.repos.metadata.list(filter);
  }

  /**
   * @throws SchemaMetadataNotFoundError
   */
  async getSchemaMetadata(ref: SchemaMetadataRef): Promise<SchemaMetadataInfo> {
    let found: SchemaMetadataInfo | null;
    if (isSchemaMetadataId(ref)) {
      // Out-of-range ids never reach storage
      found = isNumericIdInRange(ref) ? await this.repos.metadata.get(ref) : null;
    } else {
      found = await this.repos.metadata.getByName(ref.name);
    }
    if (!found) {
      throw new SchemaMetadataNotFoundError(formatSchemaMetadataRef(ref));
    }
    return found;
  }

  // ---------------------------------------------------------------------------
  // Versions
  // ---------------------------------------------------------------------------

  /**
   * Register a schema text under a family, creating the family first if it
   * does not exist. The text is validated before anything is stored.
   *
   * @returns The key of the new version, or of the identical existing one
   */
  async registerSchema(metadata: SchemaMetadataInput, schema: VersionedSchema): Promise<SchemaKey> {
    const resolved = this.resolveMetadataInput(metadata);
    const versioned = requireValid(validateVersionedSchema(schema));
    const candidate = prepareCandidate(this.providers, resolved.type, versioned.schemaText);

    const { info } = await this.ensureMetadata(resolved);
    const result = await registerPrepared(this.registration, info, candidate, versioned.description);
    return result.schemaKey;
  }

  /**
   * Add a version to an existing family.
   *
   * @returns The key of the new version, or of the identical existing one
   * @throws SchemaMetadataNotFoundError
   * @throws InvalidSchemaError
   * @throws IncompatibleSchemaError
   * @throws RegistrationConflictError
   */
  async addVersionedSchema(ref: SchemaMetadataRef, schema: VersionedSchema): Promise<SchemaKey> {
    const versioned = requireValid(validateVersionedSchema(schema));
    const info = await this.getSchemaMetadata(ref);
    const result = await registerOrReuse(this.registration, info, versioned);
    return result.schemaKey;
  }

  /**
   * @throws SchemaMetadataNotFoundError if the family is unknown
   * @throws SchemaVersionNotFoundError if the version is not in the ledger
   */
  async getSchema(ref: SchemaMetadataRef, version: number): Promise<SchemaVersionInfo> {
    const info = await this.getSchemaMetadata(ref);
    const schemaKey = { schemaMetadataId: info.id, version };
    if (!isNumericIdInRange(version)) {
      throw SchemaVersionNotFoundError.forKey(schemaKey);
    }
    const found = await this.repos.versions.get(schemaKey);
    if (!found) {
      throw SchemaVersionNotFoundError.forKey(schemaKey);
    }
    return found;
  }

  /**
   * @throws SchemaMetadataNotFoundError if the family is unknown
   * @throws SchemaVersionNotFoundError if the family has no versions
   */
  async getLatestSchema(ref: SchemaMetadataRef): Promise<SchemaVersionInfo> {
    const info = await this.getSchemaMetadata(ref);
    const latest = await this.repos.versions.getLatest(info.id);
    if (!latest) {
      throw new SchemaVersionNotFoundError(`Schema "${info.name}" has no versions`);
    }
    return latest;
  }

  /**
   * All versions, ascending. Empty for a family with no versions yet.
   *
   * @throws SchemaMetadataNotFoundError if the family is unknown
   */
  async getAllVersions(ref: SchemaMetadataRef): Promise<SchemaVersionInfo[]> {
    const info = await this.getSchemaMetadata(ref);
    return this.repos.versions.list(info.id);
  }

  /**
   * Check a text against every existing version in both directions,
   * whatever the family's own policy. Stores nothing.
   *
   * @returns true when the family has no versions
   * @throws SchemaMetadataNotFoundError
   * @throws InvalidSchemaError if the text is malformed for the family's type
   */
  async isCompatibleWithAllVersions(ref: SchemaMetadataRef, schemaText: string): Promise<boolean> {
    const info = await this.getSchemaMetadata(ref);
    const candidate = prepareCandidate(this.providers, info.type, schemaText);
    const versions = await this.repos.versions.list(info.id);
    return isCompatibleWithAll(candidate.provider, versions, candidate.schemaText);
  }

  // ---------------------------------------------------------------------------
  // Files
  // ---------------------------------------------------------------------------

  async uploadFile(source: FileSource): Promise<FileId> {
    const fileId = await this.files.upload(source);
    this.logger.debug('File uploaded', { fileId });
    return fileId;
  }

  /**
   * @throws FileNotFoundError
   */
  async downloadFile(fileId: FileId): Promise<Readable> {
    const bytes = await this.files.download(fileId);
    if (!bytes) {
      throw new FileNotFoundError(fileId);
    }
    return Readable.from([Buffer.from(bytes)], { objectMode: false });
  }

  // ---------------------------------------------------------------------------
  // Serializers and deserializers
  // ---------------------------------------------------------------------------

  /**
   * Register a serializer descriptor. Always creates a new descriptor.
   *
   * @throws ValidationError if the descriptor is malformed
   */
  async addSerializer(descriptor: SerDesDescriptor): Promise<SerDesId> {
    return this.addSerDes(descriptor, 'serializer');
  }

  /**
   * Register a deserializer descriptor. Always creates a new descriptor.
   *
   * @throws ValidationError if the descriptor is malformed
   */
  async addDeserializer(descriptor: SerDesDescriptor): Promise<SerDesId> {
    return this.addSerDes(descriptor, 'deserializer');
  }

  /**
   * Associate a serializer or deserializer with a family. Mapping the same
   * pair again changes nothing.
   *
   * @throws SchemaMetadataNotFoundError
   * @throws SerDesNotFoundError
   */
  async mapSchemaWithSerDes(ref: SchemaMetadataRef, serDesId: SerDesId): Promise<void> {
    const info = await this.getSchemaMetadata(ref);
    if (!isNumericIdInRange(serDesId)) {
      throw new SerDesNotFoundError(serDesId);
    }
    const serdes = await this.repos.serdes.get(serDesId);
    if (!serdes) {
      throw new SerDesNotFoundError(serDesId);
    }
    await this.repos.serdes.map(info.id, serDesId);
  }

  async getSerializers(ref: SchemaMetadataRef): Promise<SerDesInfo[]> {
    const info = await this.getSchemaMetadata(ref);
    return this.repos.serdes.listForSchema(info.id, 'serializer');
  }

  async getDeserializers(ref: SchemaMetadataRef): Promise<SerDesInfo[]> {
    const info = await this.getSchemaMetadata(ref);
    return this.repos.serdes.listForSchema(info.id, 'deserializer');
  }

  /**
   * Construct a new serializer from its descriptor.
   *
   * An optional guard narrows the result to a more specific serializer
   * type; instances that fail it are rejected.
   *
   * @throws InstantiationError
   */
  createSerializerInstance(info: SerDesInfo): Promise<SchemaSerializer>;
  createSerializerInstance<T extends SchemaSerializer>(
    info: SerDesInfo,
    guard: (value: SchemaSerializer) => value is T
  ): Promise<T>;
  async createSerializerInstance(
    info: SerDesInfo,
    guard?: (value: SchemaSerializer) => boolean
  ): Promise<SchemaSerializer> {
    return instantiateSerDes(
      this.instantiator,
      info,
      'serializer',
      (value): value is SchemaSerializer => isSchemaSerializer(value) && (!guard || guard(value))
    );
  }

  /**
   * Construct a new deserializer from its descriptor.
   *
   * @throws InstantiationError
   */
  createDeserializerInstance(info: SerDesInfo): Promise<SchemaDeserializer>;
  createDeserializerInstance<T extends SchemaDeserializer>(
    info: SerDesInfo,
    guard: (value: SchemaDeserializer) => value is T
  ): Promise<T>;
  async createDeserializerInstance(
    info: SerDesInfo,
    guard?: (value: SchemaDeserializer) => boolean
  ): Promise<SchemaDeserializer> {
    return instantiateSerDes(
      this.instantiator,
      info,
      'deserializer',
      (value): value is SchemaDeserializer => isSchemaDeserializer(value) && (!guard || guard(value))
    );
  }

  /**
   * Release storage resources. Later calls are no-ops.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.onClose?.();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private resolveMetadataInput(input: SchemaMetadataInput): SchemaMetadataRequest {
    const value = requireValid(validateSchemaMetadataInput(input));
    requireProvider(this.providers, value.type);
    return value;
  }

  private withDefaults(request: SchemaMetadataRequest): SchemaMetadata {
    return {
      name: request.name,
      type: request.type,
      compatibility: request.compatibility ?? this.defaultCompatibility,
      evolve: request.evolve ?? true,
      description: request.description,
    };
  }

  private async ensureMetadata(
    metadata: SchemaMetadataRequest
  ): Promise<{ info: SchemaMetadataInfo; created: boolean }> {
    const existing = await this.repos.metadata.getByName(metadata.name);
    if (existing) {
      return { info: this.matchExisting(existing, metadata), created: false };
    }

    const created = await this.repos.metadata.create(this.withDefaults(metadata));
    if (created) {
      this.logger.info('Schema metadata registered', {
        schemaName: created.name,
        schemaMetadataId: created.id,
        type: created.type,
        compatibility: created.compatibility,
      });
      return { info: created, created: true };
    }

    // Another caller created the name between the read and the insert
    const raced = await this.repos.metadata.getByName(metadata.name);
    if (!raced) {
      throw new SchemaMetadataNotFoundError(formatSchemaMetadataRef({ name: metadata.name }));
    }
    return { info: this.matchExisting(raced, metadata), created: false };
  }

  /**
   * Settings the request leaves out match whatever is stored, so a changed
   * registry default never turns a re-registration into a conflict.
   */
  private matchExisting(
    existing: SchemaMetadataInfo,
    requested: SchemaMetadataRequest
  ): SchemaMetadataInfo {
    if (!matchesSchemaMetadata(existing, requested)) {
      this.logger.warn('Schema metadata conflict', { schemaName: requested.name });
      throw new SchemaMetadataConflictError(existing, requested);
    }
    return existing;
  }

  private async addSerDes(descriptor: SerDesDescriptor, role: SerDesRole): Promise<SerDesId> {
    const value = requireValid(validateSerDesDescriptor(descriptor));
    const info = await this.repos.serdes.create(value, role);
    this.logger.info('SerDes registered', {
      serDesId: info.id,
      role,
      className: info.className,
      fileId: info.fileId,
    });
    return info.id;
  }
}

/**
 * Create a registry over the given storage.
 *
 * @example
 * ```typescript
 * const registry = createSchemaRegistry({
 *   repos: createInMemoryRepositoryContext(),
 *   files: createInMemoryFileStorage(),
 * });
 *
 * const key = await registry.registerSchema(
 *   { name: 'device.reading', type: 'record' },
 *   { schemaText: readingSchemaText }
 * );
 * ```
 */
export function createSchemaRegistry(options: SchemaRegistryOptions): SchemaRegistry {
  return new SchemaRegistry(options);
}
