/**
 * backend/src/modules/profiles/helpers/read-profile-update-request.ts
 *
 * WHY:
 * - PUT /profile accepts JSON or multipart/form-data; this turns either into
 *   { fields, picture } so the controller validates one shape.
 *
 * RULES:
 * - HTTP-boundary helper (reads the Fastify request).
 * - Multipart: text fields become strings; an empty birthdate means "clear".
 * - At most one file, and only under the profile_picture field.
 * - Size limits are enforced by @fastify/multipart (413 from toBuffer()).
 */

import type { FastifyRequest } from 'fastify';
import type { ProfilePictureUpload } from '../profile.types';
import { ProfileErrors } from '../profile.errors';

const PICTURE_FIELD = 'profile_picture';

export type ProfileUpdateRequest = {
  fields: unknown;
  picture: ProfilePictureUpload | null;
};

export async function readProfileUpdateRequest(req: FastifyRequest): Promise<ProfileUpdateRequest> {
  if (!req.isMultipart()) {
    return { fields: req.body ?? {}, picture: null };
  }

  const fields: Record<string, string | null> = {};
  let picture: ProfilePictureUpload | null = null;

  for await (const part of req.parts()) {
    if (part.type === 'file') {
      if (part.fieldname !== PICTURE_FIELD || picture) {
        // Drain the stream before failing so the request can complete.
        part.file.resume();
        throw ProfileErrors.unexpectedFile(part.fieldname);
      }
      picture = { data: await part.toBuffer(), mimetype: part.mimetype };
      continue;
    }

    if (typeof part.value === 'string') {
      fields[part.fieldname] =
        part.fieldname === 'birthdate' && part.value === '' ? null : part.value;
    }
  }

  return { fields, picture };
}
