/**
 * Counting semaphore: `acquire` waits for a free permit, `release` hands it
 * to the longest waiter.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise<void>(resolve => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }
}

/**
 * Map over items with at most `concurrency` mappers in flight.
 * Results keep the input order. After the first failure no further mapper
 * starts; the call settles once the ones in flight have finished and then
 * rejects with that first error.
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  mapper: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const semaphore = new Semaphore(Math.max(1, concurrency));
  const results: R[] = new Array(items.length);
  const failures: unknown[] = [];

  await Promise.allSettled(
    items.map(async (item, index) => {
      await semaphore.acquire();
      try {
        if (failures.length > 0) return;
        results[index] = await mapper(item, index);
      } catch (error) {
        failures.push(error);
      } finally {
        semaphore.release();
      }
    })
  );

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}

/**
 * Serialises async work per key; work for different keys runs freely.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let unlock: () => void = () => {};
    const current = new Promise<void>(resolve => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  get size(): number {
    return this.tails.size;
  }
}
