// Input validation for registry operations
//
// Every client-supplied record passes through one of these schemas before
// it reaches storage. Results follow the same shape for all inputs so
// callers can report every problem at once.

import { z } from 'zod';
import type { SchemaCompatibility } from '../types/schemas.js';

/**
 * Schema family names: an alphanumeric first character, then letters,
 * digits and the separators . _ - : /
 */
const SCHEMA_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:/-]*$/;

export const SchemaCompatibilitySchema = z.enum(['NONE', 'BACKWARD', 'FORWARD', 'BOTH', 'FULL']);

export const SchemaMetadataInputSchema = z.object({
  name: z
    .string()
    .min(1, 'Schema name must not be empty')
    .max(255, 'Schema name must be at most 255 characters')
    .regex(SCHEMA_NAME_PATTERN, 'Schema name contains invalid characters'),
  type: z.string().trim().min(1, 'Schema type must not be empty'),
  compatibility: SchemaCompatibilitySchema.optional(),
  evolve: z.boolean().optional(),
  description: z.string().max(4096).optional(),
});

/**
 * Metadata as a client submits it; compatibility and evolve fall back to
 * registry defaults when omitted.
 */
export type SchemaMetadataInput = z.infer<typeof SchemaMetadataInputSchema>;

export const VersionedSchemaSchema = z.object({
  schemaText: z.string().refine((text) => text.trim().length > 0, 'Schema text must not be empty'),
  description: z.string().max(4096).optional(),
});

export const SerDesDescriptorSchema = z.object({
  name: z.string().trim().min(1, 'SerDes name must not be empty'),
  description: z.string().max(4096).optional(),
  fileId: z.string().trim().min(1, 'fileId must not be empty'),
  className: z.string().trim().min(1, 'className must not be empty'),
});

/**
 * Validation error codes
 */
export type InputValidationErrorCode = 'MISSING_FIELD' | 'INVALID_TYPE' | 'INVALID_VALUE';

/**
 * A single validation problem, located by a dotted path
 */
export type InputValidationError = {
  path: string;
  message: string;
  code: InputValidationErrorCode;
};

export type InputValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: InputValidationError[] };

function toValidationError(issue: z.ZodIssue, root: string): InputValidationError {
  const path = [root, ...issue.path.map(String)].join('.');
  if (issue.code === 'invalid_type') {
    return {
      path,
      message: issue.received === 'undefined' ? `${path} is required` : issue.message,
      code: issue.received === 'undefined' ? 'MISSING_FIELD' : 'INVALID_TYPE',
    };
  }
  return { path, message: issue.message, code: 'INVALID_VALUE' };
}

/**
 * Run a zod schema and convert its issues into InputValidationErrors.
 */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  root: string
): InputValidationResult<T> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { valid: true, value: parsed.data };
  }
  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => toValidationError(issue, root)),
  };
}

export function validateSchemaMetadataInput(
  input: unknown
): InputValidationResult<SchemaMetadataInput> {
  return validateInput(SchemaMetadataInputSchema, input, 'metadata');
}

export function validateVersionedSchema(
  input: unknown
): InputValidationResult<z.infer<typeof VersionedSchemaSchema>> {
  return validateInput(VersionedSchemaSchema, input, 'schema');
}

export function validateSerDesDescriptor(
  input: unknown
): InputValidationResult<z.infer<typeof SerDesDescriptorSchema>> {
  return validateInput(SerDesDescriptorSchema, input, 'serdes');
}

/**
 * Check whether a string names a known compatibility policy
 */
export function isSchemaCompatibility(value: string): value is SchemaCompatibility {
  return SchemaCompatibilitySchema.safeParse(value).success;
}
