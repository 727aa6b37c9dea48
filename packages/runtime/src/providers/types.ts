// Schema type providers
//
// A provider owns everything type-specific about schema texts: whether a
// text is well-formed, what its canonical form is (fingerprints hash the
// canonical form), and whether one text can read data written with another.

import type { CompatibilityDirection } from '@schemata/protocol';

export type SchemaTextValidation = { valid: true } | { valid: false; reason: string };

export interface SchemaProvider {
  /**
   * The SchemaMetadata.type this provider handles (e.g. 'record')
   */
  readonly type: string;

  validate(schemaText: string): SchemaTextValidation;

  /**
   * Canonical form of a valid text. Texts with equal canonical forms are
   * the same schema.
   */
  canonicalize(schemaText: string): string;

  /**
   * Compatibility of two valid texts.
   *
   * 'backward': newText can read data written with oldText.
   * 'forward': oldText can read data written with newText.
   */
  isCompatible(oldText: string, newText: string, direction: CompatibilityDirection): boolean;
}
