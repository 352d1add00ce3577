/**
 * src/modules/profiles/profile.service.ts
 *
 * WHY:
 * - Read/update/delete of the caller's profile, including the user fields
 *   (names, email) edited on the same form.
 * - Only place in the profiles module allowed to start transactions.
 *
 * RULES:
 * - The picture file is written BEFORE the transaction; if the transaction
 *   fails the new file is removed, and the replaced file is only removed
 *   after commit. A DB row never points at a missing file.
 * - Email uniqueness: pre-check for a clean error, unique violation as backstop.
 */

import type { DbExecutor } from '../../shared/db/db';
import { isUniqueViolation } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestMeta } from '../../shared/http/request-meta';
import type { FileStore } from '../../shared/storage/file-store';
import { AppError } from '../../shared/http/errors';

import { getUserByEmail, getUserById, USER_EMAIL_UNIQUE, type User, type UserRepo } from '../users';

import type { ProfileRepo } from './dal/profile.repo';
import { getProfileByUserId } from './queries/profile.queries';
import { ProfileErrors } from './profile.errors';
import { auditProfileDeleted, auditProfileUpdated } from './profile.audit';
import { profilePictureExtension } from './policies/profile-picture.policy';
import type { Profile, ProfilePatch, ProfilePictureUpload } from './profile.types';

const PICTURE_NAMESPACE = 'profile-pictures';

export type UserWithProfile = { user: User; profile: Profile };

export class ProfileService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      auditRepo: AuditRepo;
      userRepo: UserRepo;
      profileRepo: ProfileRepo;
      fileStore: FileStore;
    },
  ) {}

  async getProfile(userId: string): Promise<UserWithProfile> {
    return this.loadUserWithProfile(this.deps.db, userId);
  }

  async updateProfile(params: {
    userId: string;
    patch: ProfilePatch;
    picture: ProfilePictureUpload | null;
    meta: RequestMeta;
  }): Promise<UserWithProfile> {
    const { userId, patch } = params;

    const newPictureRef = params.picture ? await this.savePicture(userId, params.picture) : null;

    let outcome: { result: UserWithProfile; replacedPictureRef: string | null };

    try {
      outcome = await this.deps.db.transaction().execute(async (trx) => {
        const existing = await getProfileByUserId(trx, userId);
        if (!existing) throw ProfileErrors.notFound();

        if (patch.email !== undefined) {
          const owner = await getUserByEmail(trx, patch.email);
          if (owner && owner.id !== userId) throw ProfileErrors.emailTaken();
        }

        await this.deps.userRepo.withDb(trx).updateUser(userId, {
          firstName: patch.firstName,
          lastName: patch.lastName,
          email: patch.email,
        });

        await this.deps.profileRepo.withDb(trx).updateProfile(userId, {
          bio: patch.bio,
          birthdate: patch.birthdate,
          profilePicture: newPictureRef ?? undefined,
        });

        const audit = new AuditWriter(this.deps.auditRepo.withDb(trx), {
          ...params.meta,
          userId,
        });
        await auditProfileUpdated(audit, {
          changedFields: Object.entries(patch)
            .filter(([, value]) => value !== undefined)
            .map(([key]) => key),
          pictureReplaced: newPictureRef !== null,
        });

        return {
          result: await this.loadUserWithProfile(trx, userId),
          replacedPictureRef: newPictureRef ? existing.profilePicture : null,
        };
      });
    } catch (err) {
      if (newPictureRef) await this.deps.fileStore.remove(newPictureRef);
      if (isUniqueViolation(err, USER_EMAIL_UNIQUE)) throw ProfileErrors.emailTaken();
      throw err;
    }

    if (outcome.replacedPictureRef) await this.deps.fileStore.remove(outcome.replacedPictureRef);

    this.deps.logger.info({
      msg: 'profile.update.success',
      flow: 'profile.update',
      requestId: params.meta.requestId,
      userId,
    });

    return outcome.result;
  }

  async deleteProfile(params: { userId: string; meta: RequestMeta }): Promise<void> {
    const deleted = await this.deps.db.transaction().execute(async (trx) => {
      const row = await this.deps.profileRepo.withDb(trx).deleteProfile(params.userId);
      if (!row) throw ProfileErrors.notFound();

      await auditProfileDeleted(
        new AuditWriter(this.deps.auditRepo.withDb(trx), { ...params.meta, userId: params.userId }),
      );
      return row;
    });

    if (deleted.profilePicture) await this.deps.fileStore.remove(deleted.profilePicture);

    this.deps.logger.info({
      msg: 'profile.delete.success',
      flow: 'profile.delete',
      requestId: params.meta.requestId,
      userId: params.userId,
    });
  }

  private async savePicture(userId: string, picture: ProfilePictureUpload): Promise<string> {
    const extension = profilePictureExtension(picture.mimetype);
    if (!extension) throw ProfileErrors.unsupportedPicture(picture.mimetype);

    return this.deps.fileStore.save({
      namespace: PICTURE_NAMESPACE,
      ownerId: userId,
      data: picture.data,
      extension,
    });
  }

  private async loadUserWithProfile(db: DbExecutor, userId: string): Promise<UserWithProfile> {
    const profile = await getProfileByUserId(db, userId);
    if (!profile) throw ProfileErrors.notFound();

    const user = await getUserById(db, userId);
    if (!user) throw AppError.internal('Profile owner missing', { userId });

    return { user, profile };
  }
}
