/**
 * src/modules/profiles/profile.audit.ts
 *
 * Typed audit helpers for the Profiles module. Field NAMES only, never values.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditProfileUpdated(
  writer: AuditWriter,
  data: { changedFields: string[]; pictureReplaced: boolean },
): Promise<void> {
  return writer.append('profile.updated', {
    changedFields: data.changedFields,
    pictureReplaced: data.pictureReplaced,
  });
}

export function auditProfileDeleted(writer: AuditWriter): Promise<void> {
  return writer.append('profile.deleted');
}
