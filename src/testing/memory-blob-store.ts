import type { BlobStore } from '../services/blob-storage.service';
import { StorageError } from '../utils/errors';

/**
 * BlobStore kept in a Map. Stored paths are the hint prefixed with `stored/`.
 * `failDeletes` makes every delete throw, as an unwritable disk would.
 */
export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, Buffer>();
  readonly deleted: string[] = [];
  failDeletes = false;

  async save(pathHint: string, bytes: Buffer): Promise<string> {
    const storedPath = `stored/${pathHint}`;
    this.blobs.set(storedPath, bytes);
    return storedPath;
  }

  async delete(storedPath: string): Promise<void> {
    if (this.failDeletes) {
      throw new StorageError(`Failed to delete blob ${storedPath}`);
    }
    this.blobs.delete(storedPath);
    this.deleted.push(storedPath);
  }
}
