// File storage for uploaded serializer/deserializer binaries.

export * from './types.js';
export * from './fs.js';
