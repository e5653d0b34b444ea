/**
 * Blob Storage Service
 * Saves signature images and returns the path stored on the contract.
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { StorageError } from '../utils/errors';

export interface BlobStore {
  /** Persist `bytes` near `pathHint`; resolves with the stored (relative) path. */
  save(pathHint: string, bytes: Buffer): Promise<string>;
  delete(storedPath: string): Promise<void>;
}

/**
 * Local-disk blob store rooted at MEDIA_ROOT.
 * Stored paths are relative to the root and never collide: a random suffix
 * is added to the hinted file name.
 */
export class LocalBlobStore implements BlobStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolveInsideRoot(relativePath: string): string {
    const absolute = path.resolve(this.root, relativePath);
    if (absolute !== this.root && !absolute.startsWith(this.root + path.sep)) {
      throw new StorageError(`Path escapes storage root: ${relativePath}`);
    }
    return absolute;
  }

  async save(pathHint: string, bytes: Buffer): Promise<string> {
    const normalized = path.posix.normalize(pathHint.replace(/\\/g, '/')).replace(/^(\.\.\/|\/)+/, '');
    const dir = path.posix.dirname(normalized);
    const ext = path.posix.extname(normalized);
    const base = path.posix.basename(normalized, ext);
    const storedPath = path.posix.join(dir, `${base}_${uuidv4().slice(0, 8)}${ext}`);

    const absolute = this.resolveInsideRoot(storedPath);
    try {
      await fs.mkdir(path.dirname(absolute), { recursive: true });
      await fs.writeFile(absolute, bytes);
    } catch (error) {
      throw new StorageError(`Failed to save blob ${storedPath}`, { cause: error });
    }
    return storedPath;
  }

  async delete(storedPath: string): Promise<void> {
    const absolute = this.resolveInsideRoot(storedPath);
    try {
      await fs.unlink(absolute);
    } catch (error) {
      throw new StorageError(`Failed to delete blob ${storedPath}`, { cause: error });
    }
  }
}
