/**
 * Event Channel
 *
 * FIFO of coordinator events, drained in source order within one tick:
 * window, element, scroll, text. Events posted while draining are handled
 * in the same drain after the current batch.
 */

import type { CoordinatorEvent, EventSource } from './coordinator-events.js';

const SOURCE_ORDER: Record<EventSource, number> = {
  window: 0,
  element: 1,
  scroll: 2,
  text: 3,
};

export type EventHandler = (event: CoordinatorEvent) => void;

export class EventChannel {
  private queue: CoordinatorEvent[] = [];
  private draining = false;

  post(event: CoordinatorEvent): void {
    this.queue.push(event);
  }

  postAll(events: readonly CoordinatorEvent[]): void {
    this.queue.push(...events);
  }

  /**
   * Deliver every queued event to handler. Re-entrant calls are no-ops;
   * the outer drain picks up anything posted meanwhile.
   *
   * @returns number of events delivered
   */
  drain(handler: EventHandler): number {
    if (this.draining) return 0;

    this.draining = true;
    let delivered = 0;
    try {
      while (this.queue.length > 0) {
        const batch = this.queue
          .map((event, index) => ({ event, index }))
          .sort(
            (left, right) =>
              SOURCE_ORDER[left.event.source] - SOURCE_ORDER[right.event.source] ||
              left.index - right.index
          )
          .map((entry) => entry.event);
        this.queue = [];

        for (const event of batch) {
          handler(event);
          delivered++;
        }
      }
    } finally {
      this.draining = false;
    }
    return delivered;
  }

  clear(): void {
    this.queue = [];
  }

  get size(): number {
    return this.queue.length;
  }
}
