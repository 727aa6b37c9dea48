// @schemata/repositories
// Repository interfaces and implementations for substrate-independent data access.
//
// This package defines the "contract" for registry storage. The actual
// implementations (Postgres, in-memory, filesystem, etc.) fulfill these
// contracts, allowing the runtime to work with any storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - FileStorage holds uploaded serializer/deserializer binaries

export * from './interfaces/index.js';
export * from './files/index.js';
export * from './in-memory/index.js';
export * as postgres from './postgres/index.js';
