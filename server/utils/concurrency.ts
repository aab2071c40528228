export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;

  constructor(capacity: number) {
    this.available = Math.max(0, Math.floor(capacity));
  }

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw new Error('Aborted');
    }

    if (this.available > 0) {
      this.available -= 1;
      return () => this.release();
    }

    return await new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(notify);
        reject(new Error('Aborted'));
      };

      const notify = () => {
        signal?.removeEventListener('abort', onAbort);
        this.available -= 1;
        resolve(() => this.release());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(notify);
    });
  }

  async use<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private removeWaiter(waiter: () => void) {
    const idx = this.waiters.indexOf(waiter);
    if (idx >= 0) {
      this.waiters.splice(idx, 1);
    }
  }

  private release() {
    this.available += 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

/** Lazily creates one semaphore per key (e.g. per host). */
export class KeyedSemaphore {
  private readonly byKey = new Map<string, Semaphore>();

  constructor(private readonly capacity: number) {}

  get(key: string): Semaphore {
    const existing = this.byKey.get(key);
    if (existing) return existing;
    const created = new Semaphore(this.capacity);
    this.byKey.set(key, created);
    return created;
  }
}

export interface WorkerPoolOptions {
  concurrency: number;
  /** Polled before each item is started; `true` leaves the rest untouched. */
  shouldStop?: () => boolean;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Returns the
 * number of items that were started.
 */
export const runWorkerPool = async <T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: WorkerPoolOptions,
): Promise<number> => {
  const workerCount = Math.min(items.length, Math.max(1, Math.floor(options.concurrency) || 1));
  let nextIndex = 0;

  const workers = new Array(workerCount).fill(null).map(async () => {
    while (true) {
      if (options.shouldStop?.()) break;
      const idx = nextIndex;
      if (idx >= items.length) break;
      nextIndex += 1;
      await worker(items[idx], idx);
    }
  });

  await Promise.all(workers);
  return nextIndex;
};
