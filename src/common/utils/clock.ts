/**
 * Time source. Everything that compares against "now" takes one so tests can
 * move time instead of waiting for it.
 */
export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export const toEpochSeconds = (ms: number): number => Math.floor(ms / 1000);
