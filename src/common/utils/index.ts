/**
 * Shares one in-flight call per key: concurrent callers for the same key all
 * receive the result of the first call. Keys are independent, so a slow call
 * for one key never delays another.
 */
export class SingleFlight<T> {
  private readonly pending = new Map<string, Promise<T>>();

  /**
   * @param key function call identifier
   * @param fn Function to share the result of
   */
  do(key: string, fn: () => Promise<T>): Promise<T> {
    const existingPending = this.pending.get(key);
    if (existingPending) {
      return existingPending;
    }
    const newPending: Promise<T> = Promise.resolve()
      .then(() => fn())
      .finally(() => {
        // A forget() may already have replaced this entry with a newer call
        if (this.pending.get(key) === newPending) {
          this.pending.delete(key);
        }
      });
    this.pending.set(key, newPending);
    return newPending;
  }

  /** Later callers for `key` start a fresh call; current waiters keep theirs. */
  forget(key: string): void {
    this.pending.delete(key);
  }

  forgetAll(): void {
    this.pending.clear();
  }
}

/**
 * Resolves after `ms`, or rejects as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
