/**
 * src/modules/profiles/profile.controller.ts
 *
 * WHY:
 * - Maps HTTP → ProfileService for GET/PUT/DELETE /profile.
 *
 * RULES:
 * - No DB access here. No business rules here.
 * - Every route requires a session.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { requestMeta } from '../../shared/http/request-meta';
import { toFieldErrors } from '../../shared/http/validation';
import { toUserView } from '../users';
import type { ProfileService, UserWithProfile } from './profile.service';
import { updateProfileSchema } from './profile.schemas';
import { readProfileUpdateRequest } from './helpers/read-profile-update-request';
import { toProfileView } from './profile.presenter';
import type { UserWithProfileView } from './profile.types';

function toView(result: UserWithProfile): UserWithProfileView {
  return { user: toUserView(result.user), profile: toProfileView(result.profile) };
}

export class ProfileController {
  constructor(private readonly profileService: ProfileService) {}

  async get(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const result = await this.profileService.getProfile(session.userId);
    return reply.status(200).send(toView(result));
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const { fields, picture } = await readProfileUpdateRequest(req);

    const parsed = updateProfileSchema.safeParse(fields);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const result = await this.profileService.updateProfile({
      userId: session.userId,
      patch: {
        firstName: parsed.data.first_name,
        lastName: parsed.data.last_name,
        email: parsed.data.email,
        bio: parsed.data.bio,
        birthdate: parsed.data.birthdate,
      },
      picture,
      meta: requestMeta(req),
    });

    return reply.status(200).send(toView(result));
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    await this.profileService.deleteProfile({ userId: session.userId, meta: requestMeta(req) });
    return reply.status(204).send();
  }
}
