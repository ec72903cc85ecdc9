import type { AppEvent } from '../types/index.js';

export const TICK_INTERVAL_MS = 100;

type Waiter = (event: AppEvent | null) => void;

/**
 * Ordered queue of application events with a single consumer. Ticks that pile
 * up while the consumer is busy are merged into one `tick` with a count.
 */
export class EventBus {
  private queue: AppEvent[] = [];
  private waiters: Waiter[] = [];
  private stoppers: Array<() => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.queue.length;
  }

  push(event: AppEvent): void {
    if (this.closed) {
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return;
    }

    const last = this.queue[this.queue.length - 1];
    if (event.type === 'tick' && last?.type === 'tick') {
      this.queue[this.queue.length - 1] = { type: 'tick', count: last.count + event.count };
      return;
    }
    this.queue.push(event);
  }

  /** Resolves with the next event, or `null` once the bus is closed. */
  next(): Promise<AppEvent | null> {
    const event = this.queue.shift();
    if (event) {
      return Promise.resolve(event);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Registers a producer teardown that runs when the bus closes. */
  onClose(stop: () => void): void {
    if (this.closed) {
      stop();
      return;
    }
    this.stoppers.push(stop);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.queue = [];

    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    for (const stop of this.stoppers.splice(0)) {
      stop();
    }
  }
}

/**
 * Pushes one tick per elapsed interval. A stalled event loop shows up as a
 * single tick with a larger count once it resumes; the remainder carries over.
 */
export function startTickSource(
  bus: EventBus,
  intervalMs: number = TICK_INTERVAL_MS,
  clock: () => number = () => performance.now()
): () => void {
  let last = clock();

  const intervalId = setInterval(() => {
    const count = Math.floor((clock() - last) / intervalMs);
    if (count > 0) {
      last += count * intervalMs;
      bus.push({ type: 'tick', count });
    }
  }, intervalMs);

  const stop = () => clearInterval(intervalId);
  bus.onClose(stop);
  return stop;
}
