import { eq, and, asc, like } from 'drizzle-orm';
import type { Database } from '../db.js';
import { schemaMetadata } from '../schema/index.js';
import type {
  SchemaMetadataRepository,
  CreateSchemaMetadataInput,
  SchemaMetadataFilter,
} from '../../interfaces/index.js';
import type { SchemaMetadataId, SchemaMetadataInfo } from '@schemata/protocol';

/**
 * Escape LIKE wildcards so a name prefix matches literally
 */
function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class PgSchemaMetadataRepository implements SchemaMetadataRepository {
  constructor(private db: Database) {}

  async create(input: CreateSchemaMetadataInput): Promise<SchemaMetadataInfo | null> {
    const [row] = await this.db
      .insert(schemaMetadata)
      .values({
        name: input.name,
        type: input.type,
        compatibility: input.compatibility,
        evolve: input.evolve,
        description: input.description,
        createdAt: new Date(),
      })
      .onConflictDoNothing({ target: schemaMetadata.name })
      .returning();

    return row ? this.rowToMetadata(row) : null;
  }

  async get(id: SchemaMetadataId): Promise<SchemaMetadataInfo | null> {
    const [row] = await this.db.select().from(schemaMetadata).where(eq(schemaMetadata.id, id));
    return row ? this.rowToMetadata(row) : null;
  }

  async getByName(name: string): Promise<SchemaMetadataInfo | null> {
    const [row] = await this.db
      .select()
      .from(schemaMetadata)
      .where(eq(schemaMetadata.name, name));
    return row ? this.rowToMetadata(row) : null;
  }

  async list(filter?: SchemaMetadataFilter): Promise<SchemaMetadataInfo[]> {
    const conditions = [];

    if (filter?.type) {
      conditions.push(eq(schemaMetadata.type, filter.type));
    }

    if (filter?.namePrefix) {
      conditions.push(like(schemaMetadata.name, `${escapeLikePattern(filter.namePrefix)}%`));
    }

    let query = this.db.select().from(schemaMetadata).$dynamic();

    if (conditions.length > 0) {
      query = query.where(and(...conditions));
    }

    query = query.orderBy(asc(schemaMetadata.id));

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map((r) => this.rowToMetadata(r));
  }

  private rowToMetadata(row: typeof schemaMetadata.$inferSelect): SchemaMetadataInfo {
    return {
      id: row.id,
      name: row.name,
      type: row.type,
      compatibility: row.compatibility,
      evolve: row.evolve,
      description: row.description ?? undefined,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
