/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages a flow enqueued without running
 *   real email infrastructure.
 * - drain() is the test contract: call it after the HTTP request completes
 *   to get all enqueued messages, then assert on their contents.
 *
 * RULES:
 * - Implements Queue interface only — no extra methods visible to flows.
 * - drain() is only used by test helpers; production code never calls it.
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
}
