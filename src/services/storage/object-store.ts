/**
 * Object storage access
 *
 * ObjectStore is the seam every component uses; GcsObjectStore is the Cloud
 * Storage implementation. Failures surface as StorageError.
 *
 * @module services/storage/object-store
 */

import { Storage } from '@google-cloud/storage';

import type { SourceLocator } from '../../models/document.js';
import { mapStorageError, StorageError } from './errors.js';
import { formatGcsUri } from './locator.js';

export interface ObjectStore {
  /** Keys under a prefix, sorted lexicographically */
  list(bucket: string, prefix: string): Promise<string[]>;
  read(locator: SourceLocator): Promise<Buffer>;
  write(locator: SourceLocator, data: Buffer | string, contentType: string): Promise<void>;
  /** Object size in bytes */
  size(locator: SourceLocator): Promise<number>;
  exists(locator: SourceLocator): Promise<boolean>;
}

export interface GcsStoreOptions {
  projectId: string;
  /** Service-account key file; application default credentials when absent */
  keyFilename?: string | null;
}

export class GcsObjectStore implements ObjectStore {
  private readonly storage: Storage;

  constructor(options: GcsStoreOptions | { client: Storage }) {
    this.storage =
      'client' in options
        ? options.client
        : new Storage({
            projectId: options.projectId,
            ...(options.keyFilename ? { keyFilename: options.keyFilename } : {}),
          });
  }

  async list(bucket: string, prefix: string): Promise<string[]> {
    try {
      const [files] = await this.storage.bucket(bucket).getFiles({
        prefix: prefix || undefined,
        autoPaginate: true,
      });
      return files.map((f) => f.name).sort();
    } catch (error) {
      throw mapStorageError(error, 'list', { bucket, key: prefix });
    }
  }

  async read(locator: SourceLocator): Promise<Buffer> {
    try {
      const [contents] = await this.file(locator).download();
      return contents;
    } catch (error) {
      throw mapStorageError(error, 'read', locator);
    }
  }

  async write(locator: SourceLocator, data: Buffer | string, contentType: string): Promise<void> {
    try {
      await this.file(locator).save(data, { contentType, resumable: false });
    } catch (error) {
      throw mapStorageError(error, 'write', locator);
    }
  }

  async size(locator: SourceLocator): Promise<number> {
    let raw: string | number | undefined;
    try {
      const [metadata] = await this.file(locator).getMetadata();
      raw = metadata.size;
    } catch (error) {
      throw mapStorageError(error, 'size', locator);
    }
    const size = typeof raw === 'number' ? raw : Number(raw);
    if (raw === undefined || !Number.isFinite(size) || size < 0) {
      throw new StorageError(
        `Object metadata has no usable size for ${formatGcsUri(locator)} (got ${String(raw)})`,
        'UNKNOWN',
        'size',
        formatGcsUri(locator)
      );
    }
    return size;
  }

  async exists(locator: SourceLocator): Promise<boolean> {
    try {
      const [exists] = await this.file(locator).exists();
      return exists;
    } catch (error) {
      throw mapStorageError(error, 'exists', locator);
    }
  }

  private file(locator: SourceLocator) {
    return this.storage.bucket(locator.bucket).file(locator.key);
  }
}
