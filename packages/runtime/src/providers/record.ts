// Record schema provider
//
// Record schemas are JSON documents:
//
//   {
//     "type": "record",
//     "name": "Reading",
//     "fields": [
//       { "name": "deviceId", "type": "string" },
//       { "name": "value", "type": "double" },
//       { "name": "unit", "type": ["null", "string"], "default": null }
//     ]
//   }
//
// A field type is a primitive name, a nested record, an array
// ({ "type": "array", "items": T }) or a union (a JSON array of types).

import { z } from 'zod';
import type { CompatibilityDirection } from '@schemata/protocol';
import { InvalidSchemaError } from '../errors.js';
import type { SchemaProvider, SchemaTextValidation } from './types.js';

export const RECORD_SCHEMA_TYPE = 'record';

const PRIMITIVE_TYPES = ['null', 'boolean', 'int', 'long', 'float', 'double', 'string', 'bytes'] as const;

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number];

export type RecordFieldType =
  | PrimitiveType
  | RecordFieldType[]
  | RecordSchema
  | { type: 'array'; items: RecordFieldType };

export type RecordField = {
  name: string;
  type: RecordFieldType;
  default?: unknown;
};

export type RecordSchema = {
  type: 'record';
  name: string;
  fields: RecordField[];
};

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const FieldTypeSchema: z.ZodType<RecordFieldType> = z.lazy(() =>
  z.union([
    z.enum(PRIMITIVE_TYPES),
    z
      .array(FieldTypeSchema)
      .min(1, 'Union must have at least one branch')
      .refine((branches) => branches.every((b) => !Array.isArray(b)), 'Union may not directly contain a union'),
    RecordSchemaSchema,
    ArrayTypeSchema,
  ])
);

const ArrayTypeSchema = z.object({
  type: z.literal('array'),
  items: FieldTypeSchema,
});

const FieldSchema = z.object({
  name: z.string().regex(NAME_PATTERN, 'Field name must be an identifier'),
  type: FieldTypeSchema,
  default: z.unknown().optional(),
});

const RecordSchemaSchema: z.ZodType<RecordSchema> = z
  .object({
    type: z.literal('record'),
    name: z.string().regex(NAME_PATTERN, 'Record name must be an identifier'),
    fields: z.array(FieldSchema),
  })
  .superRefine((record, ctx) => {
    const seen = new Set<string>();
    record.fields.forEach((field, index) => {
      if (seen.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fields', index, 'name'],
          message: `Duplicate field "${field.name}"`,
        });
      }
      seen.add(field.name);
    });
  });

/**
 * Widenings a reader may apply to a writer's primitive value
 */
const PROMOTIONS: Record<PrimitiveType, readonly PrimitiveType[]> = {
  null: [],
  boolean: [],
  int: ['long', 'float', 'double'],
  long: ['float', 'double'],
  float: ['double'],
  double: [],
  string: ['bytes'],
  bytes: ['string'],
};

function parseJson(schemaText: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(schemaText) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: `not valid JSON (${message})` };
  }
}

function checkRecordSchema(
  schemaText: string
): { ok: true; schema: RecordSchema } | { ok: false; reason: string } {
  const json = parseJson(schemaText);
  if (!json.ok) return json;

  const parsed = RecordSchemaSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const at = issue.path.length > 0 ? issue.path.join('.') : 'schema';
    return { ok: false, reason: `${at}: ${issue.message}` };
  }
  return { ok: true, schema: parsed.data };
}

/**
 * Parse a record schema text.
 *
 * @throws InvalidSchemaError if the text is not a well-formed record schema
 */
export function parseRecordSchema(schemaText: string): RecordSchema {
  const result = checkRecordSchema(schemaText);
  if (!result.ok) {
    throw new InvalidSchemaError(RECORD_SCHEMA_TYPE, result.reason);
  }
  return result.schema;
}

/**
 * Whether data written with `writer` can be read as `reader`.
 */
export function canRead(reader: RecordFieldType, writer: RecordFieldType): boolean {
  // Every value the writer can produce must be readable
  if (Array.isArray(writer)) {
    return writer.every((branch) => canRead(reader, branch));
  }
  if (Array.isArray(reader)) {
    return reader.some((branch) => canRead(branch, writer));
  }
  if (typeof reader === 'string' || typeof writer === 'string') {
    return (
      typeof reader === 'string' &&
      typeof writer === 'string' &&
      (reader === writer || PROMOTIONS[writer].includes(reader))
    );
  }
  if (reader.type === 'array' && writer.type === 'array') {
    return canRead(reader.items, writer.items);
  }
  if (reader.type === 'record' && writer.type === 'record') {
    return canReadRecord(reader, writer);
  }
  return false;
}

function canReadRecord(reader: RecordSchema, writer: RecordSchema): boolean {
  if (reader.name !== writer.name) return false;

  return reader.fields.every((field) => {
    const written = writer.fields.find((f) => f.name === field.name);
    if (!written) {
      return field.default !== undefined;
    }
    return canRead(field.type, written.type);
  });
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * Provider for JSON record schemas.
 *
 * Compatibility follows reader/writer resolution: a reader field must
 * exist in the writer with a readable type, or declare a default. Fields
 * only the writer has are skipped.
 */
export const recordSchemaProvider: SchemaProvider = {
  type: RECORD_SCHEMA_TYPE,

  validate(schemaText: string): SchemaTextValidation {
    const result = checkRecordSchema(schemaText);
    return result.ok ? { valid: true } : { valid: false, reason: result.reason };
  },

  canonicalize(schemaText: string): string {
    parseRecordSchema(schemaText);
    return JSON.stringify(sortKeys(JSON.parse(schemaText)));
  },

  isCompatible(oldText: string, newText: string, direction: CompatibilityDirection): boolean {
    const oldSchema = parseRecordSchema(oldText);
    const newSchema = parseRecordSchema(newText);
    return direction === 'backward' ? canRead(newSchema, oldSchema) : canRead(oldSchema, newSchema);
  },
};
