/**
 * Single background consumer for a {@link BoundedQueue}.
 *
 * The worker is scheduled with `setImmediate`, so everything enqueued during
 * the current tick is queued before the first item is taken. Items are
 * processed one at a time in queue order; a returned promise is awaited
 * before the next item starts.
 */

import type { BoundedQueue } from './bounded-queue.js';

export class AsyncWorker<T> {
  private running: Promise<void> | null = null;

  constructor(
    private readonly queue: BoundedQueue<T>,
    private readonly process: (item: T) => void | Promise<void>,
    private readonly onFault: (error: unknown) => void
  ) {}

  get isRunning(): boolean {
    return this.running !== null;
  }

  /** Schedules a drain pass unless one is already pending or running */
  wake(): void {
    if (this.running !== null) {
      return;
    }
    const pass: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.drain())
      .catch((error: unknown) => this.onFault(error))
      .finally(() => {
        if (this.running === pass) {
          this.running = null;
        }
        if (!this.queue.isEmpty) {
          this.wake();
        }
      });
    this.running = pass;
  }

  /** Resolves once the queue is empty and no pass is running */
  async idle(): Promise<void> {
    while (this.running !== null) {
      await this.running;
    }
  }

  private async drain(): Promise<void> {
    let item = this.queue.shift();
    while (item !== undefined) {
      const result = this.process(item);
      if (result !== undefined) {
        await result;
      }
      item = this.queue.shift();
    }
  }
}
