/**
 * FIFO async mutex. Callers queue behind the previous holder; a failing critical section
 * releases the lock like a successful one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get locked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.holders += 1;

    await previous;
    try {
      return await fn();
    } finally {
      this.holders -= 1;
      release();
    }
  }
}

/**
 * Collapses concurrent calls for the same key into one execution; every caller receives
 * the same result or error. The key is released once the execution settles.
 */
export class SingleFlight<K, V> {
  private readonly inFlight = new Map<K, Promise<V>>();

  isInFlight(key: K): boolean {
    return this.inFlight.has(key);
  }

  run(key: K, fn: () => Promise<V>): Promise<V> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const execution = Promise.resolve()
      .then(fn)
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, execution);
    return execution;
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : new Error('Aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
