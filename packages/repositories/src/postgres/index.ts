// Postgres implementations backed by Drizzle and postgres.js

export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
