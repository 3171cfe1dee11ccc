import { systemClock, type Clock } from '@/common/utils/clock';

import type { CounterState, KeyValueStore } from './keyValueStore';

interface Entry {
  value: string;
  expiresAt: number;
}

/**
 * In-process `KeyValueStore`. Each operation runs to completion inside one
 * synchronous section, which makes increment-with-expiry and set-if-absent
 * atomic without locks. Expired keys are dropped on access or by `prune()`.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly clock: Clock = systemClock) {}

  private live(key: string, now: number): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt <= now) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  async incrementWithExpiry(
    signal: AbortSignal,
    key: string,
    windowMs: number,
  ): Promise<CounterState> {
    signal.throwIfAborted();
    const now = this.clock.now();
    const entry = this.live(key, now);
    if (!entry) {
      this.entries.set(key, { value: '1', expiresAt: now + windowMs });
      return { count: 1, ttlMs: windowMs };
    }
    const count = Number.parseInt(entry.value, 10) + 1;
    entry.value = String(count);
    return { count, ttlMs: entry.expiresAt - now };
  }

  async get(signal: AbortSignal, key: string): Promise<string | null> {
    signal.throwIfAborted();
    return this.live(key, this.clock.now())?.value ?? null;
  }

  async setWithTtl(signal: AbortSignal, key: string, value: string, ttlMs: number): Promise<void> {
    signal.throwIfAborted();
    this.entries.set(key, { value, expiresAt: this.clock.now() + ttlMs });
  }

  async setIfAbsent(
    signal: AbortSignal,
    key: string,
    value: string,
    ttlMs: number,
  ): Promise<boolean> {
    signal.throwIfAborted();
    const now = this.clock.now();
    if (this.live(key, now)) {
      return false;
    }
    this.entries.set(key, { value, expiresAt: now + ttlMs });
    return true;
  }

  async delete(signal: AbortSignal, key: string): Promise<void> {
    signal.throwIfAborted();
    this.entries.delete(key);
  }

  /** Drops every expired key. Returns how many were removed. */
  prune(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
