import { isAuthError } from '@/common/errors/authErrors';
import type { KeyValueStore } from '@/common/store/keyValueStore';
import { systemClock, type Clock } from '@/common/utils/clock';
import { callStore } from '@/common/utils/deadline';
import logger from '@/lib/logger';

import type {
  FailPolicy,
  RateLimitDecision,
  RateLimitRule,
  RateLimiter,
} from '../models/ratelimit.types';
import { assertValidRule } from './memory.limiter';

export interface StoreRateLimiterOptions {
  /** What to answer when the store cannot. Required: never implicit. */
  failPolicy: FailPolicy;
  storeTimeoutMs: number;
  clock?: Clock;
}

/**
 * Fixed-window limiter over a shared `KeyValueStore`, so every instance of the
 * service counts against the same quota. The counter and its window expiry are
 * created by one atomic store operation.
 */
export class StoreRateLimiter implements RateLimiter {
  private readonly clock: Clock;

  constructor(
    readonly rule: RateLimitRule,
    private readonly store: KeyValueStore,
    private readonly options: StoreRateLimiterOptions,
  ) {
    assertValidRule(rule);
    this.clock = options.clock ?? systemClock;
  }

  private key(key: string): string {
    return `ratelimit:${this.rule.name}:${key}`;
  }

  async allow(signal: AbortSignal, key: string): Promise<RateLimitDecision> {
    const { limit, windowMs } = this.rule;
    try {
      // A counter write: retrying could count one request twice
      const { count, ttlMs } = await callStore(
        signal,
        { operation: 'ratelimit.increment', timeoutMs: this.options.storeTimeoutMs, retries: 0 },
        (attemptSignal) => this.store.incrementWithExpiry(attemptSignal, this.key(key), windowMs),
      );
      return {
        allowed: count <= limit,
        limit,
        remaining: Math.max(0, limit - count),
        resetAt: new Date(this.clock.now() + Math.max(0, ttlMs)),
        degraded: false,
      };
    } catch (error) {
      if (!isAuthError(error, 'StoreUnavailable')) {
        throw error;
      }
      if (signal.aborted) {
        // Nobody is waiting for this answer: never admit on the fail policy
        return {
          allowed: false,
          limit,
          remaining: 0,
          resetAt: new Date(this.clock.now() + windowMs),
          degraded: true,
        };
      }
      return this.degradedDecision(key, error);
    }
  }

  async reset(signal: AbortSignal, key: string): Promise<void> {
    await callStore(
      signal,
      { operation: 'ratelimit.reset', timeoutMs: this.options.storeTimeoutMs, retries: 0 },
      (attemptSignal) => this.store.delete(attemptSignal, this.key(key)),
    );
  }

  close(): void {
    // The store's lifecycle belongs to whoever created it
  }

  private degradedDecision(key: string, error: Error): RateLimitDecision {
    const { limit, windowMs } = this.rule;
    const allowed = this.options.failPolicy === 'open';
    logger.warn(
      { limiter: this.rule.name, key, failPolicy: this.options.failPolicy, err: error },
      allowed
        ? 'Rate limit store unavailable; admitting request (fail-open)'
        : 'Rate limit store unavailable; rejecting request (fail-closed)',
    );
    return {
      allowed,
      limit,
      remaining: allowed ? limit : 0,
      resetAt: new Date(this.clock.now() + windowMs),
      degraded: true,
    };
  }
}
