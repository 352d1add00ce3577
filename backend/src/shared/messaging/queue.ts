/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "this code must reach the user's phone" from "here is how SMS is sent".
 * - Flows enqueue messages; the transport is wired at the DI layer only.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase.
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - The raw verification code is allowed here: it travels to the SMS sender
 *   and is never stored anywhere else.
 */

// ── Message types ─────────────────────────────────────────────

export type TwoFactorCodeSmsMessage = {
  type: 'sms.two-factor-code';
  userId: string;
  phoneNumber: string;
  /** Raw 6-digit code; only its HMAC is stored. */
  code: string;
  expiresAt: string;
};

export type QueueMessage = TwoFactorCodeSmsMessage;

export type QueueMessageType = QueueMessage['type'];

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
