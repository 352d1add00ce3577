/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what the flows enqueued without real SMS infrastructure.
 * - drain() is the test contract: call it after the HTTP request completes,
 *   then assert on the messages.
 * - Also the default transport in dev: messages are logged (without the code)
 *   and kept in memory.
 *
 * RULES:
 * - drain() is only used by test helpers; production code never calls it.
 */

import type { Queue, QueueMessage, QueueMessageType } from './queue';
import { logger } from '../logger/logger';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    logger.info('queue.enqueued', { flow: 'queue', type: message.type, userId: message.userId });
    return Promise.resolve();
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }

  /**
   * Removes and returns the messages of one type, leaving the rest queued.
   *
   * const [sms] = queue.drainOfType('sms.two-factor-code');
   */
  drainOfType<K extends QueueMessageType>(type: K): Array<Extract<QueueMessage, { type: K }>> {
    const picked: Array<Extract<QueueMessage, { type: K }>> = [];
    const kept: QueueMessage[] = [];

    for (const message of this.drain()) {
      if (isOfType(message, type)) picked.push(message);
      else kept.push(message);
    }

    this.messages.push(...kept);
    return picked;
  }
}

function isOfType<K extends QueueMessageType>(
  message: QueueMessage,
  type: K,
): message is Extract<QueueMessage, { type: K }> {
  return message.type === type;
}
