export type FailPolicy = 'open' | 'closed';

export interface RateLimitRule {
  /** Namespaces the counters, e.g. "auth". */
  name: string;
  /** Maximum admitted requests per window. */
  limit: number;
  windowMs: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** When the current window ends. */
  resetAt: Date;
  /** Decided by the fail policy because the backing store was unavailable. */
  degraded: boolean;
}

/**
 * Fixed-window limiter: at most `rule.limit` admissions per key per window.
 * A key may see up to 2 × limit admissions across a window boundary.
 */
export interface RateLimiter {
  readonly rule: RateLimitRule;
  allow(signal: AbortSignal, key: string): Promise<RateLimitDecision>;
  reset(signal: AbortSignal, key: string): Promise<void>;
  /** Stops background work. Further calls are still answered. */
  close(): void;
}

export type RouteClass = 'auth' | 'general' | 'admin' | 'strict';

export type RateLimitPreset = 'preauth' | RouteClass;

/** Sensitive operations: not configurable, unlike the other classes. */
export const STRICT_RATE_LIMIT: Readonly<RateLimitRule> = {
  name: 'strict',
  limit: 3,
  windowMs: 5 * 60_000,
};
