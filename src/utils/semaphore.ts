/**
 * @fileOverview: Counting semaphore for bounding concurrent embedding batches and page fetches
 * @module: Semaphore
 * @keyFunctions:
 *   - Semaphore.acquire()/release(): Manual permit handling
 *   - Semaphore.run(): Run a task while holding a permit
 *   - mapWithConcurrency(): Ordered map over items with a concurrency limit
 */

export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise(resolve => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
      return;
    }
    this.permits++;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get pending(): number {
    return this.waiting.length;
  }
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep input order; settles every item like Promise.allSettled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const semaphore = new Semaphore(limit);
  return Promise.allSettled(items.map((item, index) => semaphore.run(() => fn(item, index))));
}
