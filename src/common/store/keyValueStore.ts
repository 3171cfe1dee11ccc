export interface CounterState {
  /** Value after this increment. */
  count: number;
  /** Time left before the counter expires. */
  ttlMs: number;
}

/**
 * Shared key-value capability used by the rate limiter and by refresh-token
 * rotation/revocation tracking. Implementations: in-process and Redis.
 *
 * Every method takes the caller's signal first; implementations that cannot
 * cancel a command must at least refuse to start one on an aborted signal.
 */
export interface KeyValueStore {
  /**
   * Increments `key` and, on the first increment only, sets its expiry to
   * `windowMs`. Both happen as one atomic unit.
   */
  incrementWithExpiry(signal: AbortSignal, key: string, windowMs: number): Promise<CounterState>;
  get(signal: AbortSignal, key: string): Promise<string | null>;
  setWithTtl(signal: AbortSignal, key: string, value: string, ttlMs: number): Promise<void>;
  /** Atomic set-if-not-exists. Resolves `true` when this call created the key. */
  setIfAbsent(signal: AbortSignal, key: string, value: string, ttlMs: number): Promise<boolean>;
  delete(signal: AbortSignal, key: string): Promise<void>;
}
