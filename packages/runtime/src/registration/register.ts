// Registration protocol - the only path that appends to the version ledger
//
// 1. Validate the candidate with the schema type's provider
// 2. Fingerprint its canonical form
// 3. Under the per-family lock: reuse a version with the same fingerprint,
//    otherwise check compatibility and append the next version number
// 4. If the append loses a race with another process, re-read and retry

import { createHash } from 'node:crypto';
import type {
  SchemaKey,
  SchemaMetadataId,
  SchemaMetadataInfo,
  VersionedSchema,
} from '@schemata/protocol';
import type { RepositoryContext } from '@schemata/repositories';
import {
  IncompatibleSchemaError,
  InvalidSchemaError,
  RegistrationConflictError,
} from '../errors.js';
import { evaluateCompatibility } from '../compatibility/evaluator.js';
import type { RegistryLogger } from '../logging.js';
import type { SchemaProviderRegistry } from '../providers/registry.js';
import type { SchemaProvider } from '../providers/types.js';
import type { KeyedLock } from './lock.js';

export type RegistrationDeps = {
  repos: RepositoryContext;
  providers: SchemaProviderRegistry;
  lock: KeyedLock<SchemaMetadataId>;
  logger: RegistryLogger;
  maxAttempts: number;
};

export type RegistrationResult = {
  schemaKey: SchemaKey;
  /**
   * False when an identical version already existed
   */
  created: boolean;
};

/**
 * A validated candidate, ready to register
 */
export type PreparedCandidate = {
  provider: SchemaProvider;
  schemaText: string;
  fingerprint: string;
};

/**
 * Look up the provider for a schema type.
 *
 * @throws InvalidSchemaError if no provider handles the type
 */
export function requireProvider(providers: SchemaProviderRegistry, type: string): SchemaProvider {
  const provider = providers.get(type);
  if (!provider) {
    throw new InvalidSchemaError(type, `no provider registered for schema type "${type}"`);
  }
  return provider;
}

/**
 * Hex SHA-256 of a schema text's canonical form
 */
export function fingerprintSchema(provider: SchemaProvider, schemaText: string): string {
  return createHash('sha256').update(provider.canonicalize(schemaText), 'utf8').digest('hex');
}

/**
 * Validate a candidate and compute its fingerprint. Touches no storage.
 *
 * @throws InvalidSchemaError if the type is unknown or the text is malformed
 */
export function prepareCandidate(
  providers: SchemaProviderRegistry,
  type: string,
  schemaText: string
): PreparedCandidate {
  const provider = requireProvider(providers, type);
  const validation = provider.validate(schemaText);
  if (!validation.valid) {
    throw new InvalidSchemaError(type, validation.reason);
  }
  return { provider, schemaText, fingerprint: fingerprintSchema(provider, schemaText) };
}

/**
 * Register a schema text as a version of a schema family, or return the
 * existing version with the same fingerprint.
 *
 * Either a new version becomes visible or the ledger is unchanged.
 *
 * @throws InvalidSchemaError if the text is malformed for the family's type
 * @throws IncompatibleSchemaError if the family's policy rejects the text
 * @throws RegistrationConflictError if every append attempt lost a race
 */
export async function registerOrReuse(
  deps: RegistrationDeps,
  metadata: SchemaMetadataInfo,
  schema: VersionedSchema
): Promise<RegistrationResult> {
  const candidate = prepareCandidate(deps.providers, metadata.type, schema.schemaText);
  return registerPrepared(deps, metadata, candidate, schema.description);
}

/**
 * Register an already-validated candidate. See registerOrReuse.
 */
export async function registerPrepared(
  deps: RegistrationDeps,
  metadata: SchemaMetadataInfo,
  candidate: PreparedCandidate,
  description?: string
): Promise<RegistrationResult> {
  const { repos, logger } = deps;

  return deps.lock.run(metadata.id, async () => {
    for (let attempt = 1; attempt <= deps.maxAttempts; attempt++) {
      const existing = await repos.versions.findByFingerprint(metadata.id, candidate.fingerprint);
      if (existing) {
        logger.debug('Schema version reused', {
          schemaName: metadata.name,
          version: existing.schemaKey.version,
        });
        return { schemaKey: existing.schemaKey, created: false };
      }

      const versions = await repos.versions.list(metadata.id);

      if (versions.length > 0 && !metadata.evolve) {
        logger.warn('Schema version rejected', {
          schemaName: metadata.name,
          reason: 'evolution_disabled',
        });
        throw new IncompatibleSchemaError(metadata.name, [], 'evolution_disabled');
      }

      const failures = evaluateCompatibility(
        candidate.provider,
        metadata.compatibility,
        versions,
        candidate.schemaText
      );
      if (failures.length > 0) {
        logger.warn('Schema version rejected', {
          schemaName: metadata.name,
          compatibility: metadata.compatibility,
          failures,
        });
        throw new IncompatibleSchemaError(metadata.name, failures);
      }

      const latest = versions[versions.length - 1];
      const version = latest ? latest.schemaKey.version + 1 : 1;

      const appended = await repos.versions.append({
        schemaMetadataId: metadata.id,
        version,
        schemaText: candidate.schemaText,
        fingerprint: candidate.fingerprint,
        description,
      });

      if (appended) {
        logger.info('Schema version registered', {
          schemaName: metadata.name,
          version,
          fingerprint: candidate.fingerprint,
        });
        return { schemaKey: appended.schemaKey, created: true };
      }

      logger.debug('Schema version slot taken, retrying', {
        schemaName: metadata.name,
        version,
        attempt,
      });
    }

    throw new RegistrationConflictError(metadata.name, deps.maxAttempts);
  });
}
