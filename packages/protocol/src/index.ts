// @schemata/protocol
// Data model and input validation shared by the registry packages.

export * from './types/index.js';
export * from './validation/index.js';
