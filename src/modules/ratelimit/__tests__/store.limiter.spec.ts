import { describe, it, expect, beforeEach } from 'vitest';

import type { CounterState } from '@/common/store/keyValueStore';
import { MemoryKeyValueStore } from '@/common/store/memory.store';
import { ManualClock, UnreachableKeyValueStore, neverAborted } from '@/tests/fakes';

import type { RateLimitRule } from '../models/ratelimit.types';
import { createRateLimiter } from '../services/factory';
import { MemoryRateLimiter } from '../services/memory.limiter';
import { StoreRateLimiter } from '../services/store.limiter';

const rule: RateLimitRule = { name: 'test', limit: 10, windowMs: 60_000 };

/** Never answers, like a server that accepted the connection and went silent. */
class SilentKeyValueStore extends UnreachableKeyValueStore {
  incrementWithExpiry(): Promise<CounterState> {
    this.calls++;
    return new Promise<CounterState>(() => undefined);
  }
}

describe('StoreRateLimiter', () => {
  let clock: ManualClock;
  let store: MemoryKeyValueStore;
  let limiter: StoreRateLimiter;

  beforeEach(() => {
    clock = new ManualClock();
    store = new MemoryKeyValueStore(clock);
    limiter = new StoreRateLimiter(rule, store, { failPolicy: 'closed', storeTimeoutMs: 2000, clock });
  });

  it('admits exactly `limit` requests per window and denies the next', async () => {
    for (let i = 1; i <= 10; i++) {
      const decision = await limiter.allow(neverAborted(), 'ip:10.0.0.1');
      expect(decision.allowed).toBe(true);
      expect(decision.remaining).toBe(10 - i);
    }
    expect(await limiter.allow(neverAborted(), 'ip:10.0.0.1')).toEqual({
      allowed: false,
      limit: 10,
      remaining: 0,
      resetAt: new Date(clock.now() + 60_000),
      degraded: false,
    });
  });

  it('admits 10 of 100 concurrent requests for one key', async () => {
    const decisions = await Promise.all(
      Array.from({ length: 100 }, () => limiter.allow(neverAborted(), 'principal:42')),
    );
    expect(decisions.filter((d) => d.allowed)).toHaveLength(10);
  });

  it('reports the time left in the window', async () => {
    await limiter.allow(neverAborted(), 'k');
    clock.advance(15_000);
    const decision = await limiter.allow(neverAborted(), 'k');
    expect(decision.resetAt.getTime()).toBe(clock.now() + 45_000);
  });

  it('starts over when the counter expires', async () => {
    for (let i = 0; i < 11; i++) {
      await limiter.allow(neverAborted(), 'k');
    }
    clock.advance(60_000);
    expect((await limiter.allow(neverAborted(), 'k')).remaining).toBe(9);
  });

  it('namespaces counters by rule name', async () => {
    await limiter.allow(neverAborted(), 'ip:10.0.0.1');
    expect(await store.get(neverAborted(), 'ratelimit:test:ip:10.0.0.1')).toBe('1');
  });

  it('drops the counter on reset', async () => {
    await limiter.allow(neverAborted(), 'k');
    await limiter.reset(neverAborted(), 'k');
    expect(await store.get(neverAborted(), 'ratelimit:test:k')).toBeNull();
  });

  it('fails closed when the store is unreachable, without retrying', async () => {
    const unreachable = new UnreachableKeyValueStore();
    const closed = new StoreRateLimiter(rule, unreachable, {
      failPolicy: 'closed',
      storeTimeoutMs: 2000,
      clock,
    });

    const decision = await closed.allow(neverAborted(), 'k');
    expect(decision).toMatchObject({ allowed: false, remaining: 0, degraded: true });
    expect(unreachable.calls).toBe(1);
  });

  it('fails open when configured to', async () => {
    const open = new StoreRateLimiter(rule, new UnreachableKeyValueStore(), {
      failPolicy: 'open',
      storeTimeoutMs: 2000,
      clock,
    });
    expect(await open.allow(neverAborted(), 'k')).toMatchObject({
      allowed: true,
      remaining: 10,
      degraded: true,
    });
  });

  it('gives up on a silent store after the timeout', async () => {
    const silent = new StoreRateLimiter(rule, new SilentKeyValueStore(), {
      failPolicy: 'closed',
      storeTimeoutMs: 20,
      clock,
    });
    expect(await silent.allow(neverAborted(), 'k')).toMatchObject({
      allowed: false,
      degraded: true,
    });
  });

  it('denies without consulting the fail policy when the caller cancels', async () => {
    const controller = new AbortController();
    const silent = new StoreRateLimiter(rule, new SilentKeyValueStore(), {
      failPolicy: 'open',
      storeTimeoutMs: 2000,
      clock,
    });
    const pending = silent.allow(controller.signal, 'k');
    controller.abort();
    expect(await pending).toEqual({
      allowed: false,
      limit: 10,
      remaining: 0,
      resetAt: new Date(clock.now() + 60_000),
      degraded: true,
    });
  });

  it('denies a caller that cancelled before the call', async () => {
    const controller = new AbortController();
    controller.abort();
    const unreachable = new UnreachableKeyValueStore();
    const open = new StoreRateLimiter(rule, unreachable, {
      failPolicy: 'open',
      storeTimeoutMs: 2000,
      clock,
    });

    expect(await open.allow(controller.signal, 'k')).toMatchObject({
      allowed: false,
      degraded: true,
    });
    expect(unreachable.calls).toBe(0);
  });
});

describe('createRateLimiter', () => {
  it('builds the in-process variant', () => {
    const limiter = createRateLimiter(rule, { type: 'memory', sweepIntervalMs: 0 });
    expect(limiter).toBeInstanceOf(MemoryRateLimiter);
    expect(limiter.rule).toEqual(rule);
  });

  it('builds the store-backed variant', () => {
    const limiter = createRateLimiter(rule, {
      type: 'store',
      store: new MemoryKeyValueStore(),
      failPolicy: 'open',
      storeTimeoutMs: 2000,
    });
    expect(limiter).toBeInstanceOf(StoreRateLimiter);
  });
});

