// File storage abstractions for serializer/deserializer binaries.
// Allows testing and different storage backends (filesystem, S3, etc.)

import type { FileId } from '@schemata/protocol';

/**
 * Bytes to upload: a buffer, or any async chunk source such as a Node
 * Readable stream.
 */
export type FileSource = Uint8Array | AsyncIterable<Uint8Array>;

/**
 * Write-once, read-many blob storage keyed by opaque file ids.
 *
 * A file id returned from upload stays readable for the lifetime of the
 * store, and every download of it yields the same bytes.
 */
export interface FileStorage {
  /**
   * Store the bytes and return their file id.
   */
  upload(source: FileSource): Promise<FileId>;

  /**
   * Read a file back.
   * @returns The bytes, or null if the id is unknown
   */
  download(fileId: FileId): Promise<Uint8Array | null>;
}
