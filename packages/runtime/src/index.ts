// @schemata/runtime
// Schema registration, compatibility evaluation and serializer instantiation

// Registry service
export { SchemaRegistry, createSchemaRegistry, type SchemaRegistryOptions } from './registry.js';
export { bootstrapSchemaRegistry, type BootstrapOptions } from './bootstrap.js';

// Configuration
export {
  loadConfigFromEnv,
  resolveConfig,
  DEFAULT_CONFIG,
  type SchemaRegistryConfig,
} from './config.js';

// Logging
export {
  createConsoleLogger,
  silentLogger,
  createCapturingLogger,
  LOG_LEVELS,
  type ConsoleLoggerOptions,
  type RegistryLogger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Error types
export {
  RegistryError,
  NotFoundError,
  SchemaMetadataNotFoundError,
  SchemaVersionNotFoundError,
  FileNotFoundError,
  SerDesNotFoundError,
  ValidationError,
  InvalidSchemaError,
  IncompatibleSchemaError,
  SchemaMetadataConflictError,
  RegistrationConflictError,
  InstantiationError,
  type CompatibilityFailure,
  type IncompatibilityReason,
  type InstantiationFailureReason,
} from './errors.js';

// Schema type providers
export {
  SchemaProviderRegistry,
  createDefaultProviderRegistry,
  recordSchemaProvider,
  textSchemaProvider,
  parseRecordSchema,
  canRead,
  RECORD_SCHEMA_TYPE,
  TEXT_SCHEMA_TYPE,
  type SchemaProvider,
  type SchemaTextValidation,
  type RecordSchema,
  type RecordField,
  type RecordFieldType,
  type PrimitiveType,
} from './providers/index.js';

// Compatibility and registration
export { evaluateCompatibility, isCompatibleWithAll } from './compatibility/index.js';
export {
  KeyedLock,
  registerOrReuse,
  registerPrepared,
  prepareCandidate,
  requireProvider,
  fingerprintSchema,
  type RegistrationDeps,
  type RegistrationResult,
  type PreparedCandidate,
} from './registration/index.js';

// SerDes instantiation
export {
  createModuleClassLoader,
  isConstructible,
  instantiateSerDes,
  type ClassLoader,
  type Constructible,
  type InstantiatorDeps,
} from './serdes/index.js';
