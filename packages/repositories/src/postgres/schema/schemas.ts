import {
  pgTable,
  serial,
  text,
  timestamp,
  integer,
  boolean,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

/**
 * Schema metadata table - one row per named schema family.
 */
export const schemaMetadata = pgTable(
  'schema_metadata',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    type: text('type').notNull(),
    compatibility: text('compatibility', {
      enum: ['NONE', 'BACKWARD', 'FORWARD', 'BOTH', 'FULL'],
    }).notNull(),
    evolve: boolean('evolve').notNull().default(true),
    description: text('description'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('schema_metadata_name_idx').on(table.name),
    index('schema_metadata_type_idx').on(table.type),
  ]
);

/**
 * Schema versions table - the append-only version ledger.
 *
 * The unique indexes are the append-if-absent primitive: a concurrent
 * writer that loses the race for a version slot (or re-submits a known
 * fingerprint) inserts nothing.
 */
export const schemaVersions = pgTable(
  'schema_versions',
  {
    id: serial('id').primaryKey(),
    schemaMetadataId: integer('schema_metadata_id')
      .notNull()
      .references(() => schemaMetadata.id, { onDelete: 'cascade' }),
    version: integer('version').notNull(),
    schemaText: text('schema_text').notNull(),
    fingerprint: text('fingerprint').notNull(),
    description: text('description'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('schema_versions_metadata_version_idx').on(table.schemaMetadataId, table.version),
    uniqueIndex('schema_versions_metadata_fingerprint_idx').on(
      table.schemaMetadataId,
      table.fingerprint
    ),
  ]
);
