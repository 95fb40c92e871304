/**
 * Bounded concurrency: a slot semaphore in front of an async mapper.
 * Results come back in input order regardless of completion order.
 */

export class Semaphore {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly limit: number) {}

  async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return;
    }
    // the releasing caller hands its slot straight over
    await new Promise<void>((resolve) => this.queue.push(resolve));
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  mapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const slots = new Semaphore(Math.max(1, concurrency));
  return Promise.all(
    items.map(async (item, index) => {
      await slots.acquire();
      try {
        return await mapper(item, index);
      } finally {
        slots.release();
      }
    }),
  );
}
