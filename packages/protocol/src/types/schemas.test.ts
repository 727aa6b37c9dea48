import { describe, it, expect } from 'vitest';
import {
  compatibilityChecks,
  formatSchemaKey,
  formatSchemaMetadataRef,
  matchesSchemaMetadata,
  SCHEMA_COMPATIBILITIES,
  type SchemaMetadata,
} from './schemas.js';
import { isSchemaDeserializer, isSchemaSerializer } from './serdes.js';
import { isNumericIdInRange, MAX_NUMERIC_ID } from './common.js';

describe('compatibilityChecks', () => {
  it('checks nothing for NONE', () => {
    expect(compatibilityChecks('NONE')).toEqual({ directions: [], allVersions: false });
  });

  it('checks one direction against the latest version for BACKWARD and FORWARD', () => {
    expect(compatibilityChecks('BACKWARD')).toEqual({ directions: ['backward'], allVersions: false });
    expect(compatibilityChecks('FORWARD')).toEqual({ directions: ['forward'], allVersions: false });
  });

  it('checks both directions; only FULL reaches every version', () => {
    expect(compatibilityChecks('BOTH')).toEqual({
      directions: ['backward', 'forward'],
      allVersions: false,
    });
    expect(compatibilityChecks('FULL')).toEqual({
      directions: ['backward', 'forward'],
      allVersions: true,
    });
  });

  it('covers every declared policy', () => {
    expect(SCHEMA_COMPATIBILITIES.map((c) => compatibilityChecks(c).directions.length)).toEqual([
      0, 1, 1, 2, 2,
    ]);
  });
});

describe('formatting', () => {
  it('formats ids and keys', () => {
    expect(formatSchemaMetadataRef(7)).toBe('#7');
    expect(formatSchemaMetadataRef({ name: 'device' })).toBe('"device"');
    expect(formatSchemaKey({ schemaMetadataId: 7, version: 3 })).toBe('7:3');
  });
});

describe('matchesSchemaMetadata', () => {
  const stored: SchemaMetadata = {
    name: 'device',
    type: 'record',
    compatibility: 'BACKWARD',
    evolve: true,
  };

  it('treats a missing and an empty description alike', () => {
    expect(matchesSchemaMetadata(stored, { name: 'device', type: 'record', description: '' })).toBe(true);
  });

  it('detects a policy change', () => {
    expect(matchesSchemaMetadata(stored, { ...stored, compatibility: 'FULL' })).toBe(false);
    expect(matchesSchemaMetadata(stored, { ...stored, evolve: false })).toBe(false);
  });

  it('ignores settings the request leaves out', () => {
    expect(matchesSchemaMetadata({ ...stored, description: 'Readings' }, { name: 'device', type: 'record' })).toBe(
      true
    );
  });

  it('never matches a different type', () => {
    expect(matchesSchemaMetadata(stored, { name: 'device', type: 'text' })).toBe(false);
  });
});

describe('isNumericIdInRange', () => {
  it('accepts integers from 1 to the storage maximum', () => {
    expect(isNumericIdInRange(1)).toBe(true);
    expect(isNumericIdInRange(MAX_NUMERIC_ID)).toBe(true);
  });

  it('rejects zero, negatives, fractions, NaN and out-of-range values', () => {
    for (const value of [0, -1, 1.5, Number.NaN, Number.POSITIVE_INFINITY, 3e9]) {
      expect(isNumericIdInRange(value)).toBe(false);
    }
  });
});

describe('capability guards', () => {
  it('recognises serializers and deserializers by method', () => {
    const serializer = { serialize: () => new Uint8Array() };
    const deserializer = { deserialize: () => ({}) };

    expect(isSchemaSerializer(serializer)).toBe(true);
    expect(isSchemaDeserializer(serializer)).toBe(false);
    expect(isSchemaDeserializer(deserializer)).toBe(true);
    expect(isSchemaSerializer({ serialize: 'nope' })).toBe(false);
    expect(isSchemaSerializer(null)).toBe(false);
  });
});
