import { defineConfig } from 'drizzle-kit';

// Same variables the registry reads at runtime
const url =
  process.env.SCHEMA_REGISTRY_DATABASE_URL ??
  process.env.DATABASE_URL ??
  'postgres://localhost:5432/schema_registry';

export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './drizzle',
  dbCredentials: { url },
  migrations: {
    table: 'schema_registry_migrations',
  },
  strict: true,
});
