import { describe, it, expect } from 'vitest';

import { deferred } from '@/tests/fakes';

import { SingleFlight, sleep } from '..';

describe('SingleFlight', () => {
  it('shares one call between concurrent callers of a key', async () => {
    const flights = new SingleFlight<number>();
    const hold = deferred();
    let calls = 0;
    const fn = async () => {
      calls++;
      await hold.promise;
      return 7;
    };

    const first = flights.do('a', fn);
    const second = flights.do('a', fn);
    expect(second).toBe(first);
    hold.release();

    expect(await Promise.all([first, second])).toEqual([7, 7]);
    expect(calls).toBe(1);
    await flights.do('a', fn);
    expect(calls).toBe(2);
  });

  it('keeps keys independent', async () => {
    const flights = new SingleFlight<string>();
    const hold = deferred();
    const slow = flights.do('slow', async () => {
      await hold.promise;
      return 'slow';
    });

    await expect(flights.do('fast', async () => 'fast')).resolves.toBe('fast');
    hold.release();
    await expect(slow).resolves.toBe('slow');
  });

  it('starts a fresh call after forget, leaving the old one to its waiters', async () => {
    const flights = new SingleFlight<number>();
    const hold = deferred();
    const old = flights.do('a', async () => {
      await hold.promise;
      return 1;
    });
    flights.forget('a');
    const fresh = flights.do('a', async () => 2);

    await expect(fresh).resolves.toBe(2);
    hold.release();
    await expect(old).resolves.toBe(1);
  });

  it('clears the key when the call fails, including synchronous throws', async () => {
    const flights = new SingleFlight<number>();
    await expect(
      flights.do('a', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(flights.do('a', async () => 3)).resolves.toBe(3);
  });
});

describe('sleep', () => {
  it('rejects when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(5_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow('Aborted');
  });
});
