// Tests for registry bootstrap

import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { bootstrapSchemaRegistry } from './bootstrap.js';
import { createCapturingLogger } from './logging.js';

describe('bootstrapSchemaRegistry', () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('runs fully in memory without a database or directory', async () => {
    const logger = createCapturingLogger();
    const registry = bootstrapSchemaRegistry({}, { logger });

    const key = await registry.registerSchema({ name: 'notes', type: 'text' }, { schemaText: 'free text' });

    expect(key).toEqual({ schemaMetadataId: 1, version: 1 });
    expect(logger.entries[0]).toMatchObject({
      level: 'info',
      message: 'Schema registry configured',
      data: { storage: 'memory', files: 'memory', defaultCompatibility: 'BACKWARD' },
    });
    await registry.close();
  });

  it('writes uploads under the configured directory', async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'schemata-bootstrap-'));
    const registry = bootstrapSchemaRegistry({ fileStorageDir: tempDir }, { logger: createCapturingLogger() });

    const fileId = await registry.uploadFile(new TextEncoder().encode('abc'));

    expect(fileId).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(await readdir(path.join(tempDir, 'ba'))).toEqual([fileId]);
  });

  it('selects postgres storage for a database URL without connecting', async () => {
    const logger = createCapturingLogger();
    const registry = bootstrapSchemaRegistry(
      { databaseUrl: 'postgres://localhost:5432/registry_test', maxConnections: 1 },
      { logger }
    );

    expect(logger.entries[0]?.data).toEqual({
      storage: 'postgres',
      files: 'memory',
      defaultCompatibility: 'BACKWARD',
    });
    await registry.close();
  });

  it('logs to the console at the configured level by default', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    await bootstrapSchemaRegistry({ logLevel: 'warn' }).close();
    expect(info).not.toHaveBeenCalled();

    await bootstrapSchemaRegistry({ logLevel: 'info' }).close();
    expect(info).toHaveBeenCalledWith('[INFO] schema-registry: Schema registry configured', {
      storage: 'memory',
      files: 'memory',
      defaultCompatibility: 'BACKWARD',
    });
  });

  it('passes the default compatibility through', async () => {
    const registry = bootstrapSchemaRegistry(
      { defaultCompatibility: 'NONE' },
      { logger: createCapturingLogger() }
    );

    await registry.registerSchemaMetadata({ name: 'notes', type: 'text' });

    expect((await registry.getSchemaMetadata(1)).compatibility).toBe('NONE');
  });
});
