// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Numeric identifier assigned by the registry (monotonic per record kind)
 */
export type NumericId = number;

/**
 * Opaque identifier of an uploaded file
 */
export type FileId = string;

/**
 * Largest id a storage backend assigns (the Postgres integer range)
 */
export const MAX_NUMERIC_ID = 2_147_483_647;

/**
 * Check that a number can name a stored record or version: an integer
 * from 1 to MAX_NUMERIC_ID.
 */
export function isNumericIdInRange(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 1 && value <= MAX_NUMERIC_ID;
}
