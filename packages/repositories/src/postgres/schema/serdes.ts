import { pgTable, serial, text, timestamp, integer, index, primaryKey } from 'drizzle-orm/pg-core';
import { schemaMetadata } from './schemas.js';

/**
 * Serializer/deserializer descriptors.
 */
export const serdes = pgTable(
  'serdes',
  {
    id: serial('id').primaryKey(),
    role: text('role', { enum: ['serializer', 'deserializer'] }).notNull(),
    name: text('name').notNull(),
    description: text('description'),
    fileId: text('file_id').notNull(),
    className: text('class_name').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('serdes_role_idx').on(table.role)]
);

/**
 * Edges between schema families and descriptors. Removing either side
 * removes the edge and nothing else.
 */
export const schemaSerdesMappings = pgTable(
  'schema_serdes_mappings',
  {
    schemaMetadataId: integer('schema_metadata_id')
      .notNull()
      .references(() => schemaMetadata.id, { onDelete: 'cascade' }),
    serdesId: integer('serdes_id')
      .notNull()
      .references(() => serdes.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.schemaMetadataId, table.serdesId] }),
    index('schema_serdes_mappings_serdes_idx').on(table.serdesId),
  ]
);
