/**
 * src/modules/auth/auth.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Auth module.
 * - Keeps audit action strings + metadata shapes in one place.
 *
 * RULES:
 * - No phone numbers, emails, passwords, tokens or codes in metadata.
 * - Use AuditWriter (context is bound once by the flow).
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export type LoginFailureReason = 'user_not_found' | 'wrong_password';

export function auditRegisterSuccess(
  writer: AuditWriter,
  data: { userId: string; sessionId: string },
): Promise<void> {
  return writer.append('auth.register.success', {
    userId: data.userId,
    sessionId: data.sessionId,
  });
}

export function auditLoginSuccess(
  writer: AuditWriter,
  data: { sessionId: string; identifierKind: 'phone' | 'email' },
): Promise<void> {
  return writer.append('auth.login.success', {
    sessionId: data.sessionId,
    identifierKind: data.identifierKind,
  });
}

export function auditLoginFailed(
  writer: AuditWriter,
  data: { reason: LoginFailureReason; identifierKind: 'phone' | 'email' },
): Promise<void> {
  return writer.append('auth.login.failed', {
    reason: data.reason,
    identifierKind: data.identifierKind,
  });
}

export function auditLogout(writer: AuditWriter, data: { sessionId: string }): Promise<void> {
  return writer.append('auth.logout', { sessionId: data.sessionId });
}

export function auditTwoFactorCodeIssued(
  writer: AuditWriter,
  data: { codeId: string; expiresAt: Date },
): Promise<void> {
  return writer.append('auth.two_factor.code_issued', {
    codeId: data.codeId,
    expiresAt: data.expiresAt.toISOString(),
  });
}

export function auditTwoFactorEnabled(writer: AuditWriter, data: { codeId: string }) {
  return writer.append('auth.two_factor.enabled', { codeId: data.codeId });
}

export function auditTwoFactorFailed(writer: AuditWriter): Promise<void> {
  return writer.append('auth.two_factor.failed', { reason: 'invalid_code' });
}
