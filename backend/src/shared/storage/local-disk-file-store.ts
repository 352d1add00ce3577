/**
 * backend/src/shared/storage/local-disk-file-store.ts
 *
 * Stores files under a root directory (UPLOADS_DIR). Refs look like
 * "profile-pictures/<ownerId>/<uuid>.png".
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { FileStore, SaveFileInput } from './file-store';

const SAFE_SEGMENT = /^[A-Za-z0-9_-]+$/;
const SAFE_EXTENSION = /^\.[a-z0-9]{1,8}$/;

export class LocalDiskFileStore implements FileStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async save(input: SaveFileInput): Promise<string> {
    if (!SAFE_SEGMENT.test(input.namespace) || !SAFE_SEGMENT.test(input.ownerId)) {
      throw new Error('LocalDiskFileStore: namespace and ownerId must be plain path segments');
    }
    if (!SAFE_EXTENSION.test(input.extension)) {
      throw new Error(`LocalDiskFileStore: invalid extension "${input.extension}"`);
    }

    const ref = `${input.namespace}/${input.ownerId}/${randomUUID()}${input.extension}`;
    const target = this.resolveRef(ref);

    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, input.data);

    return ref;
  }

  async remove(ref: string): Promise<void> {
    await rm(this.resolveRef(ref), { force: true });
  }

  /** Absolute path of a ref; refuses refs that escape the root directory. */
  resolveRef(ref: string): string {
    const target = path.resolve(this.rootDir, ref);
    if (!target.startsWith(this.rootDir + path.sep)) {
      throw new Error('LocalDiskFileStore: file reference escapes the storage root');
    }
    return target;
  }
}
