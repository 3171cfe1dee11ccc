import { callStore } from '@/common/utils/deadline';
import { systemClock, type Clock } from '@/common/utils/clock';
import logger from '@/lib/logger';

export type HealthStatus = 'healthy' | 'unhealthy';

/** One external dependency the service needs to answer requests. */
export interface HealthChecker {
  name: string;
  /** Resolves when the dependency answers; rejects otherwise. */
  check(signal: AbortSignal): Promise<void>;
}

export interface CheckResult {
  name: string;
  status: HealthStatus;
  message?: string;
  responseTimeMs: number;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  checks: CheckResult[];
}

export interface HealthServiceOptions {
  /** Upper bound for each check. */
  timeoutMs: number;
}

/**
 * Runs every registered check concurrently. The report is unhealthy as soon
 * as one check fails; failure details go to the logs, not to the client.
 */
export class HealthService {
  constructor(
    private readonly checkers: readonly HealthChecker[],
    private readonly options: HealthServiceOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  async checkAll(signal: AbortSignal): Promise<HealthReport> {
    const checks = await Promise.all(this.checkers.map((checker) => this.run(signal, checker)));
    return {
      status: checks.every((check) => check.status === 'healthy') ? 'healthy' : 'unhealthy',
      timestamp: new Date(this.clock.now()).toISOString(),
      checks,
    };
  }

  private async run(signal: AbortSignal, checker: HealthChecker): Promise<CheckResult> {
    const startedAt = this.clock.now();
    try {
      await callStore(
        signal,
        { operation: `health.${checker.name}`, timeoutMs: this.options.timeoutMs, retries: 0 },
        (attemptSignal) => checker.check(attemptSignal),
      );
      return {
        name: checker.name,
        status: 'healthy',
        responseTimeMs: this.clock.now() - startedAt,
      };
    } catch (error) {
      logger.warn({ err: error, check: checker.name }, 'Health check failed');
      return {
        name: checker.name,
        status: 'unhealthy',
        message: `${checker.name} check failed`,
        responseTimeMs: this.clock.now() - startedAt,
      };
    }
  }
}

export function databaseChecker(database: { query(sql: string): Promise<unknown> }): HealthChecker {
  return {
    name: 'database',
    async check() {
      await database.query('SELECT 1');
    },
  };
}

export function redisChecker(client: { ping(): Promise<unknown> }): HealthChecker {
  return {
    name: 'redis',
    async check() {
      await client.ping();
    },
  };
}
