import type { KeyValueStore } from '@/common/store/keyValueStore';
import type { Clock } from '@/common/utils/clock';

import type { FailPolicy, RateLimitRule, RateLimiter } from '../models/ratelimit.types';
import { MemoryRateLimiter } from './memory.limiter';
import { StoreRateLimiter } from './store.limiter';

export type RateLimiterBackend =
  | {
      type: 'memory';
      sweepIntervalMs?: number;
      maxBuckets?: number;
    }
  | {
      type: 'store';
      store: KeyValueStore;
      failPolicy: FailPolicy;
      storeTimeoutMs: number;
    };

/**
 * Builds a limiter for `rule` on the selected backend. Both variants answer
 * the same `RateLimiter` contract.
 */
export function createRateLimiter(
  rule: RateLimitRule,
  backend: RateLimiterBackend,
  clock?: Clock,
): RateLimiter {
  switch (backend.type) {
    case 'memory':
      return new MemoryRateLimiter(rule, {
        clock,
        sweepIntervalMs: backend.sweepIntervalMs,
        maxBuckets: backend.maxBuckets,
      });
    case 'store':
      return new StoreRateLimiter(rule, backend.store, {
        failPolicy: backend.failPolicy,
        storeTimeoutMs: backend.storeTimeoutMs,
        clock,
      });
  }
}
