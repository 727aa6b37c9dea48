// Re-export all schema tables
export * from './schemas.js';
export * from './serdes.js';
