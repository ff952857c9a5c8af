import { ConfigError } from '../shared/errors.js';

export type TaskOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface TaskHandle<T> {
  readonly label: string;
  /** Settles when the task finishes. Never rejects. */
  readonly result: Promise<TaskOutcome<T>>;
}

/**
 * Fixed-capacity pool. submit() holds the caller until a slot is free, then starts the task and
 * hands back its handle. A finishing task passes its slot straight to the oldest waiter.
 */
export class WorkerPool {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError(`Worker pool capacity must be a positive integer, got ${capacity}`, { capacity });
    }
  }

  get running(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async submit<T>(label: string, task: () => Promise<T>): Promise<TaskHandle<T>> {
    await this.acquire();
    return { label, result: this.execute(task) };
  }

  private async execute<T>(task: () => Promise<T>): Promise<TaskOutcome<T>> {
    try {
      return { ok: true, value: await task() };
    } catch (error) {
      return { ok: false, error };
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, items.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
