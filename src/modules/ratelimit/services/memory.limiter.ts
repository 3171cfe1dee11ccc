import { ConfigError } from '@/common/errors/authErrors';
import { systemClock, type Clock } from '@/common/utils/clock';
import logger from '@/lib/logger';

import type { RateLimitDecision, RateLimitRule, RateLimiter } from '../models/ratelimit.types';

interface RateLimitBucket {
  windowStart: number;
  count: number;
  /** For sweeping idle keys. */
  lastSeen: number;
}

export interface MemoryRateLimiterOptions {
  clock?: Clock;
  /** 0 disables the background sweep; `sweep()` can still be called. */
  sweepIntervalMs?: number;
  /** Buckets untouched for this many windows are swept. */
  idleWindows?: number;
  maxBuckets?: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;
const DEFAULT_IDLE_WINDOWS = 3;
const DEFAULT_MAX_BUCKETS = 100_000;

export function assertValidRule(rule: RateLimitRule): void {
  if (!Number.isInteger(rule.limit) || rule.limit <= 0) {
    throw new ConfigError(`Rate limit "${rule.name}" must allow at least one request`);
  }
  if (!Number.isFinite(rule.windowMs) || rule.windowMs <= 0) {
    throw new ConfigError(`Rate limit "${rule.name}" needs a positive window`);
  }
}

/**
 * Per-process fixed-window limiter. Each `allow` reads and updates its bucket
 * without yielding to the event loop, so concurrent requests for one key can
 * never both take the last slot.
 *
 * Buckets are kept in the map in order of last use: every `allow` moves its
 * key to the end, so the first key is always the least recently seen.
 */
export class MemoryRateLimiter implements RateLimiter {
  private readonly buckets = new Map<string, RateLimitBucket>();
  private readonly clock: Clock;
  private readonly idleWindows: number;
  private readonly maxBuckets: number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly rule: RateLimitRule,
    options: MemoryRateLimiterOptions = {},
  ) {
    assertValidRule(rule);
    this.clock = options.clock ?? systemClock;
    this.idleWindows = options.idleWindows ?? DEFAULT_IDLE_WINDOWS;
    this.maxBuckets = options.maxBuckets ?? DEFAULT_MAX_BUCKETS;

    const interval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (interval > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), interval);
      // Must not keep the process alive on its own
      this.sweepTimer.unref();
    }
  }

  async allow(_signal: AbortSignal, key: string): Promise<RateLimitDecision> {
    const now = this.clock.now();
    const { limit, windowMs } = this.rule;

    let bucket = this.buckets.get(key);
    if (!bucket || now - bucket.windowStart >= windowMs) {
      bucket = { windowStart: now, count: 0, lastSeen: now };
    }
    bucket.lastSeen = now;
    this.buckets.delete(key);
    this.buckets.set(key, bucket);
    this.enforceCapacity();

    const allowed = bucket.count < limit;
    if (allowed) {
      bucket.count++;
    }
    return {
      allowed,
      limit,
      remaining: limit - bucket.count,
      resetAt: new Date(bucket.windowStart + windowMs),
      degraded: false,
    };
  }

  async reset(_signal: AbortSignal, key: string): Promise<void> {
    this.buckets.delete(key);
  }

  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Removes buckets idle for `idleWindows` windows. Returns how many. */
  sweep(): number {
    const cutoff = this.clock.now() - this.idleWindows * this.rule.windowMs;
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      // Ordered by last use: everything after this one is fresher
      if (bucket.lastSeen >= cutoff) break;
      this.buckets.delete(key);
      removed++;
    }
    if (removed > 0) {
      logger.debug({ limiter: this.rule.name, removed }, 'Swept idle rate limit buckets');
    }
    return removed;
  }

  get size(): number {
    return this.buckets.size;
  }

  private enforceCapacity(): void {
    while (this.buckets.size > this.maxBuckets) {
      const oldest = this.buckets.keys().next();
      if (oldest.done) return;
      this.buckets.delete(oldest.value);
      logger.warn(
        { limiter: this.rule.name, maxBuckets: this.maxBuckets },
        'Rate limit bucket cap reached; evicted least recently seen key',
      );
    }
  }
}
