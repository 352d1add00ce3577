/**
 * backend/src/shared/storage/file-store.ts
 *
 * WHY:
 * - Profile pictures are binary blobs; the database only keeps a reference.
 * - Services depend on this interface so the backing store (local disk today,
 *   object storage later) is chosen in di.ts only.
 *
 * HOW TO USE:
 * - const ref = await fileStore.save({ namespace: 'profile-pictures', ownerId, data, extension: '.png' })
 * - await fileStore.remove(ref)
 *
 * RULES:
 * - A reference is an opaque, relative, '/'-separated path.
 * - remove() of a missing file is a no-op.
 */

export type SaveFileInput = {
  namespace: string;
  ownerId: string;
  data: Buffer;
  /** Including the dot, e.g. ".png". */
  extension: string;
};

export interface FileStore {
  save(input: SaveFileInput): Promise<string>;
  remove(ref: string): Promise<void>;
}
