import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;

  /**
   * Pool size (default 10)
   */
  maxConnections?: number;

  /**
   * Seconds close() waits for running queries before dropping connections
   * (default 5)
   */
  closeTimeoutSeconds?: number;
};

/**
 * Open a registry database: a lazily connecting postgres.js pool wrapped
 * in Drizzle with the registry tables.
 *
 * No connection is made until the first query, so building a registry
 * over an unreachable database fails on first use, not here.
 *
 * ```ts
 * const { db, close } = createDatabase({ connectionString: config.databaseUrl });
 * const repos = createPgRepositoryContext(db);
 * // ...
 * await close();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
    // Drop server notices
    onnotice: () => {},
  });

  const db = drizzle(client, { schema });
  const timeout = config.closeTimeoutSeconds ?? 5;

  return {
    db,
    close: () => client.end({ timeout }),
  };
}

export type Database = ReturnType<typeof createDatabase>['db'];
