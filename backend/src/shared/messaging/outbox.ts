/**
 * src/shared/messaging/outbox.ts
 *
 * WHY:
 * - Services decide inside a transaction which notifications a change produces,
 *   but must only enqueue them once the transaction has committed.
 *
 * HOW TO USE:
 * - const outbox = new Outbox();
 * - await db.transaction().execute(async (trx) => { ...; outbox.add(msg); });
 * - await outbox.flush(queue);
 *
 * RULES:
 * - A rolled-back transaction simply never reaches flush().
 */

import type { Queue, QueueMessage } from './queue';

export class Outbox {
  private readonly pending: QueueMessage[] = [];

  add(message: QueueMessage): void {
    this.pending.push(message);
  }

  async flush(queue: Queue): Promise<void> {
    const messages = this.pending.splice(0, this.pending.length);
    for (const message of messages) {
      await queue.enqueue(message);
    }
  }
}
