import { z } from 'zod';

import type { CounterState, KeyValueStore } from './keyValueStore';

/**
 * The node-redis commands this store relies on. Declared structurally so the
 * store can be exercised against a fake client.
 */
export interface RedisCommandClient {
  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
  get(key: string): Promise<unknown>;
  set(key: string, value: string, options: { PX: number; NX?: true }): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

/**
 * INCR and PEXPIRE run server-side as one script: a crash between two separate
 * calls would leave a counter that never expires. A key found without a TTL
 * (written by something else) gets one instead of counting forever.
 */
export const INCREMENT_WITH_EXPIRY_SCRIPT = `
local current = redis.call('INCR', KEYS[1])
if current == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return {current, ttl}
`;

const counterReplySchema = z.tuple([z.coerce.number().int(), z.coerce.number().int()]);

export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    private readonly client: RedisCommandClient,
    private readonly keyPrefix = '',
  ) {}

  private key(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  async incrementWithExpiry(
    signal: AbortSignal,
    key: string,
    windowMs: number,
  ): Promise<CounterState> {
    signal.throwIfAborted();
    const reply = await this.client.eval(INCREMENT_WITH_EXPIRY_SCRIPT, {
      keys: [this.key(key)],
      arguments: [String(windowMs)],
    });
    const parsed = counterReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new Error(`Unexpected reply from counter script: ${JSON.stringify(reply)}`);
    }
    const [count, ttlMs] = parsed.data;
    return { count, ttlMs };
  }

  async get(signal: AbortSignal, key: string): Promise<string | null> {
    signal.throwIfAborted();
    const value = await this.client.get(this.key(key));
    return typeof value === 'string' ? value : null;
  }

  async setWithTtl(signal: AbortSignal, key: string, value: string, ttlMs: number): Promise<void> {
    signal.throwIfAborted();
    await this.client.set(this.key(key), value, { PX: Math.max(1, Math.ceil(ttlMs)) });
  }

  async setIfAbsent(
    signal: AbortSignal,
    key: string,
    value: string,
    ttlMs: number,
  ): Promise<boolean> {
    signal.throwIfAborted();
    const reply = await this.client.set(this.key(key), value, {
      PX: Math.max(1, Math.ceil(ttlMs)),
      NX: true,
    });
    return reply === 'OK';
  }

  async delete(signal: AbortSignal, key: string): Promise<void> {
    signal.throwIfAborted();
    await this.client.del(this.key(key));
  }
}
