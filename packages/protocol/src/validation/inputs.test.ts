// Tests for registry input validation

import { describe, it, expect } from 'vitest';
import {
  validateSchemaMetadataInput,
  validateVersionedSchema,
  validateSerDesDescriptor,
  isSchemaCompatibility,
} from './inputs.js';

describe('validateSchemaMetadataInput', () => {
  it('accepts a minimal metadata record', () => {
    const result = validateSchemaMetadataInput({ name: 'com.example.reading', type: 'record' });

    expect(result).toEqual({
      valid: true,
      value: { name: 'com.example.reading', type: 'record' },
    });
  });

  it('keeps optional fields when present', () => {
    const result = validateSchemaMetadataInput({
      name: 'orders/v1:created',
      type: 'record',
      compatibility: 'FULL',
      evolve: false,
      description: 'Order events',
    });

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value.compatibility).toBe('FULL');
      expect(result.value.evolve).toBe(false);
      expect(result.value.description).toBe('Order events');
    }
  });

  it('reports a missing name', () => {
    const result = validateSchemaMetadataInput({ type: 'record' });

    expect(result).toEqual({
      valid: false,
      errors: [
        { path: 'metadata.name', message: 'metadata.name is required', code: 'MISSING_FIELD' },
      ],
    });
  });

  it('rejects names with whitespace', () => {
    const result = validateSchemaMetadataInput({ name: 'has space', type: 'record' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toEqual([
        {
          path: 'metadata.name',
          message: 'Schema name contains invalid characters',
          code: 'INVALID_VALUE',
        },
      ]);
    }
  });

  it('rejects unknown compatibility values', () => {
    const result = validateSchemaMetadataInput({
      name: 'a',
      type: 'record',
      compatibility: 'SIDEWAYS',
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].path).toBe('metadata.compatibility');
      expect(result.errors[0].code).toBe('INVALID_VALUE');
    }
  });

  it('reports wrong field types', () => {
    const result = validateSchemaMetadataInput({ name: 'a', type: 'record', evolve: 'yes' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0]).toMatchObject({ path: 'metadata.evolve', code: 'INVALID_TYPE' });
    }
  });

  it('collects every problem at once', () => {
    const result = validateSchemaMetadataInput({ name: '', type: '  ' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors.map((e) => e.path)).toContain('metadata.name');
      expect(result.errors.map((e) => e.path)).toContain('metadata.type');
    }
  });
});

describe('validateVersionedSchema', () => {
  it('accepts schema text with a description', () => {
    const result = validateVersionedSchema({ schemaText: '{"type":"record"}', description: 'v2' });

    expect(result).toEqual({
      valid: true,
      value: { schemaText: '{"type":"record"}', description: 'v2' },
    });
  });

  it('rejects blank schema text', () => {
    const result = validateVersionedSchema({ schemaText: '   ' });

    expect(result).toEqual({
      valid: false,
      errors: [
        {
          path: 'schema.schemaText',
          message: 'Schema text must not be empty',
          code: 'INVALID_VALUE',
        },
      ],
    });
  });
});

describe('validateSerDesDescriptor', () => {
  it('accepts a complete descriptor', () => {
    const result = validateSerDesDescriptor({
      name: 'json serializer',
      fileId: 'file-1',
      className: 'com.example.JsonSerializer',
    });

    expect(result.valid).toBe(true);
  });

  it('reports a missing className', () => {
    const result = validateSerDesDescriptor({ name: 'json serializer', fileId: 'file-1' });

    expect(result).toEqual({
      valid: false,
      errors: [
        { path: 'serdes.className', message: 'serdes.className is required', code: 'MISSING_FIELD' },
      ],
    });
  });
});

describe('isSchemaCompatibility', () => {
  it('accepts the five policies', () => {
    for (const value of ['NONE', 'BACKWARD', 'FORWARD', 'BOTH', 'FULL']) {
      expect(isSchemaCompatibility(value)).toBe(true);
    }
  });

  it('is case sensitive', () => {
    expect(isSchemaCompatibility('full')).toBe(false);
  });
});
