// Compatibility evaluation of a candidate text against existing versions

import { compatibilityChecks, type SchemaCompatibility, type SchemaVersionInfo } from '@schemata/protocol';
import type { CompatibilityFailure } from '../errors.js';
import type { SchemaProvider } from '../providers/types.js';

/**
 * Check a candidate against a version ledger under a compatibility policy.
 *
 * BACKWARD, FORWARD and BOTH compare against the latest version only; FULL
 * compares against every version; NONE accepts anything. An empty ledger
 * accepts anything.
 *
 * @param versions - The ledger, ascending by version
 * @returns Every failing (version, direction) pair; empty when compatible
 */
export function evaluateCompatibility(
  provider: SchemaProvider,
  compatibility: SchemaCompatibility,
  versions: SchemaVersionInfo[],
  candidateText: string
): CompatibilityFailure[] {
  const { directions, allVersions } = compatibilityChecks(compatibility);
  if (directions.length === 0 || versions.length === 0) {
    return [];
  }

  const targets = allVersions ? versions : versions.slice(-1);
  const failures: CompatibilityFailure[] = [];

  for (const target of targets) {
    for (const direction of directions) {
      if (!provider.isCompatible(target.schemaText, candidateText, direction)) {
        failures.push({ version: target.schemaKey.version, direction });
      }
    }
  }

  return failures;
}

/**
 * Whether a candidate passes FULL checks against every version, whatever
 * policy the schema family itself uses.
 */
export function isCompatibleWithAll(
  provider: SchemaProvider,
  versions: SchemaVersionInfo[],
  candidateText: string
): boolean {
  return evaluateCompatibility(provider, 'FULL', versions, candidateText).length === 0;
}
