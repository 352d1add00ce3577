/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit writer (DB persistence).
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here. No AppError.
 * - Must work with both DB and transactions (DbExecutor).
 * - Metadata is accepted as plain object and converted to JSON here.
 */

import type { DbExecutor } from '../db/db';
import type { JsonObject, JsonValue } from '../db/schema';
import type { AuditEventInsert, AuditMetadata } from './audit.types';

// Drops undefined, functions and symbols; Dates become ISO strings.
function toJsonValue(input: unknown): JsonValue | undefined {
  if (input === null) return null;
  if (typeof input === 'string' || typeof input === 'boolean') return input;
  if (typeof input === 'number') return Number.isFinite(input) ? input : null;
  if (input instanceof Date) return input.toISOString();
  if (Array.isArray(input)) return input.map((item) => toJsonValue(item) ?? null);
  if (typeof input === 'object') return toJsonObject(Object.entries(input));
  return undefined;
}

function toJsonObject(entries: Array<[string, unknown]>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of entries) {
    const json = toJsonValue(value);
    if (json !== undefined) out[key] = json;
  }
  return out;
}

export function toAuditMetadataJson(metadata: AuditMetadata | undefined): JsonObject {
  return toJsonObject(Object.entries(metadata ?? {}));
}

export class AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  /** Returns a repo bound to a different executor (e.g. a transaction). */
  withDb(db: DbExecutor): AuditRepo {
    return new AuditRepo(db);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        user_id: event.userId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        metadata: toAuditMetadataJson(event.metadata),
      })
      .execute();
  }
}
