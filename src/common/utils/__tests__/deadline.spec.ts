import { describe, it, expect } from 'vitest';

import { AuthError, StoreUnavailableError } from '@/common/errors/authErrors';
import { neverAborted } from '@/tests/fakes';

import { callStore } from '../deadline';

const options = { operation: 'test.read', timeoutMs: 50 };

describe('callStore', () => {
  it('returns the store answer', async () => {
    await expect(callStore(neverAborted(), options, async () => 'value')).resolves.toBe('value');
  });

  it('times out a silent call and aborts its attempt signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = callStore(neverAborted(), options, (signal) => {
      seen.signal = signal;
      return new Promise<string>(() => undefined);
    });

    await expect(pending).rejects.toThrow('test.read failed: test.read timed out after 50ms');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('retries a read once', async () => {
    let calls = 0;
    const value = await callStore(neverAborted(), { ...options, retries: 1 }, async () => {
      calls++;
      if (calls === 1) throw new Error('connection reset');
      return calls;
    });
    expect(value).toBe(2);
  });

  it('does not retry writes', async () => {
    let calls = 0;
    const pending = callStore(neverAborted(), options, async () => {
      calls++;
      throw new Error('connection reset');
    });
    await expect(pending).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(calls).toBe(1);
  });

  it('never retries after the caller cancels', async () => {
    const controller = new AbortController();
    let calls = 0;
    const pending = callStore(controller.signal, { ...options, retries: 1, timeoutMs: 5000 }, () => {
      calls++;
      return new Promise<string>(() => undefined);
    });
    controller.abort();

    await expect(pending).rejects.toThrow('test.read cancelled by caller');
    expect(calls).toBe(1);
  });

  it('does not start for a caller that already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    await expect(
      callStore(controller.signal, options, async () => {
        calls++;
      }),
    ).rejects.toMatchObject({ kind: 'StoreUnavailable', operation: 'test.read' });
    expect(calls).toBe(0);
  });

  it('passes deterministic failures through without retrying', async () => {
    let calls = 0;
    const pending = callStore(neverAborted(), { ...options, retries: 1 }, async () => {
      calls++;
      throw new AuthError('Malformed', 'bad input');
    });
    await expect(pending).rejects.toMatchObject({ kind: 'Malformed' });
    expect(calls).toBe(1);
  });
});
