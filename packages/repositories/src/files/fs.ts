// Filesystem and in-memory implementations of FileStorage.
// The filesystem store uses the Node.js fs module and content addressing.

import { createHash, randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { FileId } from '@schemata/protocol';
import type { FileSource, FileStorage } from './types.js';

const CONTENT_ID_PATTERN = /^[a-f0-9]{64}$/;

/**
 * Read a FileSource fully into one buffer.
 */
export async function collectBytes(source: FileSource): Promise<Uint8Array> {
  if (source instanceof Uint8Array) {
    return new Uint8Array(source);
  }

  const chunks: Uint8Array[] = [];
  let length = 0;
  for await (const chunk of source) {
    chunks.push(chunk);
    length += chunk.byteLength;
  }

  const bytes = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return bytes;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Create a FileStorage that writes to the local filesystem.
 *
 * Files are content-addressed: the id is the hex SHA-256 of the bytes, so
 * uploading identical bytes twice returns the same id and stores one copy.
 * Files live under `<rootDir>/<first two hex chars>/<id>`.
 */
export function createFilesystemFileStorage(rootDir: string): FileStorage {
  const pathFor = (fileId: FileId) => path.join(rootDir, fileId.slice(0, 2), fileId);

  async function isStored(fileId: FileId): Promise<boolean> {
    try {
      await fs.access(pathFor(fileId));
      return true;
    } catch {
      return false;
    }
  }

  return {
    async upload(source) {
      const bytes = await collectBytes(source);
      const fileId = createHash('sha256').update(bytes).digest('hex');

      if (await isStored(fileId)) {
        return fileId;
      }

      const target = pathFor(fileId);
      await fs.mkdir(path.dirname(target), { recursive: true });

      // Write beside the target and rename so readers never see a partial file
      const tempPath = `${target}.${randomUUID()}.tmp`;
      await fs.writeFile(tempPath, bytes);
      await fs.rename(tempPath, target);

      return fileId;
    },

    async download(fileId) {
      if (!CONTENT_ID_PATTERN.test(fileId)) return null;
      try {
        return new Uint8Array(await fs.readFile(pathFor(fileId)));
      } catch (error) {
        if (isMissingFileError(error)) return null;
        throw error;
      }
    },
  };
}

/**
 * Create a FileStorage that keeps files in memory (for testing).
 * Every upload gets a new random id.
 */
export function createInMemoryFileStorage(): FileStorage & { files: Map<FileId, Uint8Array> } {
  const files = new Map<FileId, Uint8Array>();

  return {
    files,

    async upload(source) {
      const bytes = await collectBytes(source);
      const fileId = randomUUID();
      files.set(fileId, bytes);
      return fileId;
    },

    async download(fileId) {
      const bytes = files.get(fileId);
      return bytes ? new Uint8Array(bytes) : null;
    },
  };
}
