// Text schema provider - opaque schema texts with no structural rules

import type { SchemaProvider } from './types.js';

export const TEXT_SCHEMA_TYPE = 'text';

export const textSchemaProvider: SchemaProvider = {
  type: TEXT_SCHEMA_TYPE,

  validate(schemaText) {
    return schemaText.trim().length > 0
      ? { valid: true }
      : { valid: false, reason: 'schema text is empty' };
  },

  canonicalize(schemaText) {
    return schemaText;
  },

  isCompatible() {
    return true;
  },
};
