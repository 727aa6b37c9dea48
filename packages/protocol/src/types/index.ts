// Re-export all protocol types

export * from './common.js';
export * from './schemas.js';
export * from './serdes.js';
