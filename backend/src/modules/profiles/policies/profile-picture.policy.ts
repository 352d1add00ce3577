/**
 * backend/src/modules/profiles/policies/profile-picture.policy.ts
 *
 * WHY:
 * - Pure decision: which uploaded files are accepted as profile pictures,
 *   and under which file extension they are stored.
 *
 * RULES:
 * - Only raster image types browsers render inline.
 * - The extension comes from the declared mimetype, never from the client's filename.
 */

const PICTURE_EXTENSIONS: Readonly<Record<string, string>> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/gif': '.gif',
  'image/webp': '.webp',
};

export function profilePictureExtension(mimetype: string): string | null {
  return PICTURE_EXTENSIONS[mimetype.toLowerCase()] ?? null;
}
