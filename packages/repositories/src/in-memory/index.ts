// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
// - Embedding the registry in a single process
//
// Data does not persist between restarts.

import type {
  SchemaMetadataId,
  SchemaMetadataInfo,
  SchemaVersionInfo,
  SerDesId,
  SerDesInfo,
} from '@schemata/protocol';
import type {
  RepositoryContext,
  SchemaMetadataRepository,
  SchemaVersionRepository,
  SerDesRepository,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  metadata: Map<SchemaMetadataId, SchemaMetadataInfo>;
  versions: Map<SchemaMetadataId, SchemaVersionInfo[]>;
  serdes: Map<SerDesId, SerDesInfo>;
  mappings: Map<SchemaMetadataId, Set<SerDesId>>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends RepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data and restart id sequences */
  clear(): void;
}

function copyVersion(entry: SchemaVersionInfo): SchemaVersionInfo {
  return { ...entry, schemaKey: { ...entry.schemaKey } };
}

/**
 * Create a complete in-memory repository context.
 *
 * Every method completes its reads and writes without yielding, so each
 * call is atomic with respect to other callers in the same process.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * const metadata = await repos.metadata.create({
 *   name: 'device.reading',
 *   type: 'record',
 *   compatibility: 'BACKWARD',
 *   evolve: true,
 * });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.metadata.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  // Data stores
  const metadata = new Map<SchemaMetadataId, SchemaMetadataInfo>();
  const versions = new Map<SchemaMetadataId, SchemaVersionInfo[]>();
  const serdes = new Map<SerDesId, SerDesInfo>();
  const mappings = new Map<SchemaMetadataId, Set<SerDesId>>();

  let nextMetadataId = 1;
  let nextSerDesId = 1;

  // Schema metadata repository
  const metadataRepo: SchemaMetadataRepository = {
    async create(input) {
      for (const existing of metadata.values()) {
        if (existing.name === input.name) return null;
      }
      const record: SchemaMetadataInfo = {
        id: nextMetadataId++,
        name: input.name,
        type: input.type,
        compatibility: input.compatibility,
        evolve: input.evolve,
        description: input.description,
        createdAt: new Date().toISOString(),
      };
      metadata.set(record.id, record);
      versions.set(record.id, []);
      return { ...record };
    },
    async get(id) {
      const record = metadata.get(id);
      return record ? { ...record } : null;
    },
    async getByName(name) {
      for (const record of metadata.values()) {
        if (record.name === name) return { ...record };
      }
      return null;
    },
    async list(filter) {
      let result = Array.from(metadata.values());
      if (filter?.type) {
        result = result.filter((m) => m.type === filter.type);
      }
      if (filter?.namePrefix) {
        const prefix = filter.namePrefix;
        result = result.filter((m) => m.name.startsWith(prefix));
      }
      result.sort((a, b) => a.id - b.id);
      if (filter?.offset) {
        result = result.slice(filter.offset);
      }
      if (filter?.limit) {
        result = result.slice(0, filter.limit);
      }
      return result.map((m) => ({ ...m }));
    },
  };

  // Version ledger
  const versionRepo: SchemaVersionRepository = {
    async append(input) {
      const ledger = versions.get(input.schemaMetadataId);
      if (!ledger) return null;
      const taken = ledger.some(
        (v) => v.schemaKey.version === input.version || v.fingerprint === input.fingerprint
      );
      if (taken) return null;

      const entry: SchemaVersionInfo = {
        schemaKey: { schemaMetadataId: input.schemaMetadataId, version: input.version },
        schemaText: input.schemaText,
        fingerprint: input.fingerprint,
        description: input.description,
        createdAt: new Date().toISOString(),
      };
      ledger.push(entry);
      ledger.sort((a, b) => a.schemaKey.version - b.schemaKey.version);
      return copyVersion(entry);
    },
    async get(key) {
      const entry = versions
        .get(key.schemaMetadataId)
        ?.find((v) => v.schemaKey.version === key.version);
      return entry ? copyVersion(entry) : null;
    },
    async getLatest(schemaMetadataId) {
      const ledger = versions.get(schemaMetadataId) ?? [];
      const latest = ledger[ledger.length - 1];
      return latest ? copyVersion(latest) : null;
    },
    async list(schemaMetadataId) {
      return (versions.get(schemaMetadataId) ?? []).map(copyVersion);
    },
    async findByFingerprint(schemaMetadataId, fingerprint) {
      const entry = versions.get(schemaMetadataId)?.find((v) => v.fingerprint === fingerprint);
      return entry ? copyVersion(entry) : null;
    },
  };

  // SerDes repository
  const serdesRepo: SerDesRepository = {
    async create(descriptor, role) {
      const info: SerDesInfo = {
        id: nextSerDesId++,
        role,
        name: descriptor.name,
        description: descriptor.description,
        fileId: descriptor.fileId,
        className: descriptor.className,
        createdAt: new Date().toISOString(),
      };
      serdes.set(info.id, info);
      return { ...info };
    },
    async get(id) {
      const info = serdes.get(id);
      return info ? { ...info } : null;
    },
    async map(schemaMetadataId, serDesId) {
      const edges = mappings.get(schemaMetadataId) ?? new Set<SerDesId>();
      edges.add(serDesId);
      mappings.set(schemaMetadataId, edges);
    },
    async listForSchema(schemaMetadataId, role) {
      const edges = mappings.get(schemaMetadataId) ?? new Set<SerDesId>();
      return Array.from(edges)
        .sort((a, b) => a - b)
        .map((id) => serdes.get(id))
        .filter((info): info is SerDesInfo => info !== undefined && info.role === role)
        .map((info) => ({ ...info }));
    },
  };

  return {
    metadata: metadataRepo,
    versions: versionRepo,
    serdes: serdesRepo,
    _data: {
      metadata,
      versions,
      serdes,
      mappings,
    },
    clear() {
      metadata.clear();
      versions.clear();
      serdes.clear();
      mappings.clear();
      nextMetadataId = 1;
      nextSerDesId = 1;
    },
  };
}
