import { Counter, Registry, collectDefaultMetrics } from 'prom-client';

import type { AuthErrorKind } from '@/common/errors/authErrors';

export type AuthAttemptType = 'token' | 'login' | 'refresh';

export type AuthAttemptOutcome =
  | 'success'
  | 'unauthenticated'
  | 'forbidden'
  | 'rate_limited'
  | 'unavailable';

export type RateLimitOutcome = 'allowed' | 'denied' | 'degraded';

export interface SecurityMetricsOptions {
  /** Prepended to every metric name. */
  prefix?: string;
  /** Process metrics (CPU, memory, event loop) in the same registry. */
  collectDefaults?: boolean;
}

/**
 * Prometheus counters of the security core, each set in its own registry so
 * several containers (tests) never share state.
 */
export class SecurityMetrics {
  readonly registry = new Registry();

  private readonly authAttempts: Counter<'type' | 'outcome'>;
  private readonly tokenRejections: Counter<'kind'>;
  private readonly tokensIssued: Counter<'kind'>;
  private readonly rateLimitDecisions: Counter<'limiter' | 'outcome'>;

  constructor(options: SecurityMetricsOptions = {}) {
    const prefix = options.prefix ?? 'access_gate_';
    const registers = [this.registry];

    this.authAttempts = new Counter({
      name: `${prefix}auth_attempts_total`,
      help: 'Authentication attempts by type and outcome',
      labelNames: ['type', 'outcome'] as const,
      registers,
    });
    this.tokenRejections = new Counter({
      name: `${prefix}token_rejections_total`,
      help: 'Rejected tokens by internal failure kind',
      labelNames: ['kind'] as const,
      registers,
    });
    this.tokensIssued = new Counter({
      name: `${prefix}tokens_issued_total`,
      help: 'Signed tokens issued by kind',
      labelNames: ['kind'] as const,
      registers,
    });
    this.rateLimitDecisions = new Counter({
      name: `${prefix}rate_limit_decisions_total`,
      help: 'Rate limiter decisions by limiter and outcome',
      labelNames: ['limiter', 'outcome'] as const,
      registers,
    });

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry, prefix });
    }
  }

  recordAuthAttempt(type: AuthAttemptType, outcome: AuthAttemptOutcome): void {
    this.authAttempts.inc({ type, outcome });
  }

  recordTokenRejected(kind: AuthErrorKind): void {
    this.tokenRejections.inc({ kind });
  }

  recordTokenIssued(kind: 'access' | 'refresh'): void {
    this.tokensIssued.inc({ kind });
  }

  recordRateLimitDecision(limiter: string, outcome: RateLimitOutcome): void {
    this.rateLimitDecisions.inc({ limiter, outcome });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /** Prometheus text exposition of every metric in the registry. */
  render(): Promise<string> {
    return this.registry.metrics();
  }
}
