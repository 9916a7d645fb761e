/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests inspect what the flows enqueued without running any mail transport.
 * - drain() is the test contract: call it after the request completes, then
 *   assert on the messages.
 *
 * RULES:
 * - Production code never calls drain().
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /** Returns all enqueued messages and clears the queue. */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }

  /** Drains and keeps only messages of one type. */
  drainOfType<K extends QueueMessage['type']>(type: K): Extract<QueueMessage, { type: K }>[] {
    return this.drain().filter((m): m is Extract<QueueMessage, { type: K }> => m.type === type);
  }
}
