/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (security trail stored in DB).
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction is a closed union so a typo fails the type-check.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Never put tokens, passwords, codes or phone numbers in metadata.
 * - Never import module types here (shared must stay module-agnostic).
 */

export type AuditAction =
  | 'auth.register.success'
  | 'auth.login.success'
  | 'auth.login.failed'
  | 'auth.logout'
  | 'auth.two_factor.code_issued'
  | 'auth.two_factor.enabled'
  | 'auth.two_factor.failed'
  | 'profile.updated'
  | 'profile.deleted';

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context, identical across every audit event of one request.
 * userId is null until the flow knows who the caller is.
 */
export type AuditContext = {
  userId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
