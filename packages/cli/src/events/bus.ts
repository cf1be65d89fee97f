import { deepFreeze, type Event } from './event';

/**
 * Unbounded FIFO channel of events. `publish` never blocks; `next` waits
 * until an event is available.
 */
export class EventBus {
  private readonly queue: Event[] = [];
  private waiters: Array<(event: Event) => void> = [];
  private closed = false;

  publish(event: Event): void {
    if (this.closed) return;

    deepFreeze(event);

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return;
    }
    this.queue.push(event);
  }

  /**
   * Removes the oldest event, or returns null when the queue is empty.
   */
  tryNext(): Event | null {
    return this.queue.shift() ?? null;
  }

  next(): Promise<Event> {
    const event = this.queue.shift();
    if (event) {
      return Promise.resolve(event);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Drops queued events and ignores further publishes. Pending `next` calls never resolve.
   */
  close(): void {
    this.closed = true;
    this.queue.length = 0;
    this.waiters = [];
  }
}
