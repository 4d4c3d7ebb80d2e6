/** Counting semaphore; `acquire` resolves with the function that gives the permit back. */
export class Semaphore {
  private permits: number;
  private waitQueue: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs a positive integer of permits, got ${permits}`);
    }
    this.permits = permits;
  }

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.permits--;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };
      if (this.permits > 0) {
        grant();
      } else {
        this.waitQueue.push(grant);
      }
    });
  }

  get available(): number {
    return this.permits;
  }

  private release(): void {
    this.permits++;
    const next = this.waitQueue.shift();
    if (next) next();
  }
}

/**
 * Maps `worker` over `items` with at most `limit` calls in flight.
 * Every item settles; results keep the input order.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const semaphore = new Semaphore(limit);
  return Promise.allSettled(
    items.map(async (item, index) => {
      const release = await semaphore.acquire();
      try {
        return await worker(item, index);
      } finally {
        release();
      }
    }),
  );
}
