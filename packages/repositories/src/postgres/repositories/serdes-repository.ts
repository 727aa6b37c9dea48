import { eq, and, asc, inArray } from 'drizzle-orm';
import type { Database } from '../db.js';
import { serdes, schemaSerdesMappings } from '../schema/index.js';
import type { SerDesRepository } from '../../interfaces/index.js';
import type {
  SchemaMetadataId,
  SerDesDescriptor,
  SerDesId,
  SerDesInfo,
  SerDesRole,
} from '@schemata/protocol';

export class PgSerDesRepository implements SerDesRepository {
  constructor(private db: Database) {}

  async create(descriptor: SerDesDescriptor, role: SerDesRole): Promise<SerDesInfo> {
    const [row] = await this.db
      .insert(serdes)
      .values({
        role,
        name: descriptor.name,
        description: descriptor.description,
        fileId: descriptor.fileId,
        className: descriptor.className,
        createdAt: new Date(),
      })
      .returning();

    return this.rowToSerDes(row);
  }

  async get(id: SerDesId): Promise<SerDesInfo | null> {
    const [row] = await this.db.select().from(serdes).where(eq(serdes.id, id));
    return row ? this.rowToSerDes(row) : null;
  }

  async map(schemaMetadataId: SchemaMetadataId, serDesId: SerDesId): Promise<void> {
    await this.db
      .insert(schemaSerdesMappings)
      .values({ schemaMetadataId, serdesId: serDesId, createdAt: new Date() })
      .onConflictDoNothing();
  }

  async listForSchema(schemaMetadataId: SchemaMetadataId, role: SerDesRole): Promise<SerDesInfo[]> {
    const mapped = this.db
      .select({ id: schemaSerdesMappings.serdesId })
      .from(schemaSerdesMappings)
      .where(eq(schemaSerdesMappings.schemaMetadataId, schemaMetadataId));

    const rows = await this.db
      .select()
      .from(serdes)
      .where(and(inArray(serdes.id, mapped), eq(serdes.role, role)))
      .orderBy(asc(serdes.id));

    return rows.map((r) => this.rowToSerDes(r));
  }

  private rowToSerDes(row: typeof serdes.$inferSelect): SerDesInfo {
    return {
      id: row.id,
      role: row.role,
      name: row.name,
      description: row.description ?? undefined,
      fileId: row.fileId,
      className: row.className,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
