import { eq, and, asc, desc } from 'drizzle-orm';
import type { Database } from '../db.js';
import { schemaVersions } from '../schema/index.js';
import type {
  SchemaVersionRepository,
  AppendSchemaVersionInput,
} from '../../interfaces/index.js';
import type { SchemaKey, SchemaMetadataId, SchemaVersionInfo } from '@schemata/protocol';

export class PgSchemaVersionRepository implements SchemaVersionRepository {
  constructor(private db: Database) {}

  async append(input: AppendSchemaVersionInput): Promise<SchemaVersionInfo | null> {
    // A unique-index conflict on (metadata, version) or (metadata, fingerprint)
    // inserts nothing and returns no row
    const [row] = await this.db
      .insert(schemaVersions)
      .values({
        schemaMetadataId: input.schemaMetadataId,
        version: input.version,
        schemaText: input.schemaText,
        fingerprint: input.fingerprint,
        description: input.description,
        createdAt: new Date(),
      })
      .onConflictDoNothing()
      .returning();

    return row ? this.rowToVersion(row) : null;
  }

  async get(key: SchemaKey): Promise<SchemaVersionInfo | null> {
    const [row] = await this.db
      .select()
      .from(schemaVersions)
      .where(
        and(
          eq(schemaVersions.schemaMetadataId, key.schemaMetadataId),
          eq(schemaVersions.version, key.version)
        )
      );

    return row ? this.rowToVersion(row) : null;
  }

  async getLatest(schemaMetadataId: SchemaMetadataId): Promise<SchemaVersionInfo | null> {
    const [row] = await this.db
      .select()
      .from(schemaVersions)
      .where(eq(schemaVersions.schemaMetadataId, schemaMetadataId))
      .orderBy(desc(schemaVersions.version))
      .limit(1);

    return row ? this.rowToVersion(row) : null;
  }

  async list(schemaMetadataId: SchemaMetadataId): Promise<SchemaVersionInfo[]> {
    const rows = await this.db
      .select()
      .from(schemaVersions)
      .where(eq(schemaVersions.schemaMetadataId, schemaMetadataId))
      .orderBy(asc(schemaVersions.version));

    return rows.map((r) => this.rowToVersion(r));
  }

  async findByFingerprint(
    schemaMetadataId: SchemaMetadataId,
    fingerprint: string
  ): Promise<SchemaVersionInfo | null> {
    const [row] = await this.db
      .select()
      .from(schemaVersions)
      .where(
        and(
          eq(schemaVersions.schemaMetadataId, schemaMetadataId),
          eq(schemaVersions.fingerprint, fingerprint)
        )
      );

    return row ? this.rowToVersion(row) : null;
  }

  private rowToVersion(row: typeof schemaVersions.$inferSelect): SchemaVersionInfo {
    return {
      schemaKey: { schemaMetadataId: row.schemaMetadataId, version: row.version },
      schemaText: row.schemaText,
      fingerprint: row.fingerprint,
      description: row.description ?? undefined,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
