// Schema type providers

export type { SchemaProvider, SchemaTextValidation } from './types.js';
export { SchemaProviderRegistry } from './registry.js';
export {
  recordSchemaProvider,
  parseRecordSchema,
  canRead,
  RECORD_SCHEMA_TYPE,
  type RecordSchema,
  type RecordField,
  type RecordFieldType,
  type PrimitiveType,
} from './record.js';
export { textSchemaProvider, TEXT_SCHEMA_TYPE } from './text.js';

import { SchemaProviderRegistry } from './registry.js';
import { recordSchemaProvider } from './record.js';
import { textSchemaProvider } from './text.js';

/**
 * Create a provider registry holding the built-in 'record' and 'text'
 * providers.
 */
export function createDefaultProviderRegistry(): SchemaProviderRegistry {
  return new SchemaProviderRegistry([recordSchemaProvider, textSchemaProvider]);
}
