/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Phase 1 transport, and the test double: tests inspect what the services
 *   enqueued without running real notification infrastructure.
 * - drain() is the test contract: call it after the HTTP request completes
 *   to get all enqueued messages, then assert on their contents.
 *
 * RULES:
 * - Implements Queue interface only; no extra methods visible to services.
 * - drain() is only used by test helpers; production code never calls it.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /**
   * Returns all enqueued messages and clears the queue.
   */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
