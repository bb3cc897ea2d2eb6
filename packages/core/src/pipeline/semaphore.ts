import { CancelledError } from '../errors.js';

/**
 * Counting semaphore for limiting concurrency of async operations.
 * Uses a FIFO queue for waiters to ensure fair scheduling.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError('Semaphore maxConcurrent must be at least 1');
    }
    this.available = maxConcurrent;
  }

  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Run `fn` with a semaphore slot. Waits if all slots are taken; a waiter
   * whose signal fires leaves the queue and rejects with CancelledError.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('Cancelled while queued'));
    }
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(new CancelledError('Cancelled while queued'));
      };
      const waiter = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Transfer slot directly to next waiter
      next();
    } else {
      this.available++;
    }
  }
}
