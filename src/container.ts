import type { AppConfig } from '@/config';
import type { KeyValueStore } from '@/common/store/keyValueStore';
import { MemoryKeyValueStore } from '@/common/store/memory.store';
import type { Clock } from '@/common/utils/clock';
import type { AccessEvents, AccessStore, CredentialStore } from '@/modules/access/models/access.types';
import { AuthGate, type GateLimiters } from '@/modules/auth/services/gate.services';
import { LoginService } from '@/modules/auth/services/login.services';
import { PermissionResolver } from '@/modules/permissions/services/permission.services';
import { SecurityMetrics } from '@/lib/metrics';
import { HealthService, type HealthChecker } from '@/modules/health/services/health.services';
import {
  STRICT_RATE_LIMIT,
  createRateLimiter,
  type RateLimitPreset,
  type RateLimitRule,
  type RateLimiterBackend,
} from '@/modules/ratelimit';
import { TokenService } from '@/modules/tokens';

export interface ContainerDeps {
  accessStore: AccessStore & CredentialStore;
  /** Shared counters, consumed and revoked token ids. */
  kvStore: KeyValueStore;
  /** Mutations the permission cache listens to. */
  accessEvents?: AccessEvents;
  clock?: Clock;
  /** Defaults to a fresh registry without process metrics. */
  metrics?: SecurityMetrics;
  /** Dependencies checked by the readiness route. */
  healthCheckers?: HealthChecker[];
}

export interface Container {
  config: AppConfig;
  tokenService: TokenService;
  permissionResolver: PermissionResolver;
  limiters: GateLimiters;
  gate: AuthGate;
  loginService: LoginService;
  metrics: SecurityMetrics;
  health: HealthService;
  /** Stops limiter sweeps, store pruning and event subscriptions. */
  close(): void;
}

export function rateLimitRules(config: AppConfig): Record<RateLimitPreset, RateLimitRule> {
  const rule = (name: string, limit: number, windowSeconds: number): RateLimitRule => ({
    name,
    limit,
    windowMs: windowSeconds * 1000,
  });
  return {
    preauth: rule('preauth', config.RATE_LIMIT_PREAUTH_MAX, config.RATE_LIMIT_PREAUTH_WINDOW_SECONDS),
    auth: rule('auth', config.RATE_LIMIT_AUTH_MAX, config.RATE_LIMIT_AUTH_WINDOW_SECONDS),
    general: rule('general', config.RATE_LIMIT_GENERAL_MAX, config.RATE_LIMIT_GENERAL_WINDOW_SECONDS),
    admin: rule('admin', config.RATE_LIMIT_ADMIN_MAX, config.RATE_LIMIT_ADMIN_WINDOW_SECONDS),
    strict: STRICT_RATE_LIMIT,
  };
}

/**
 * Builds the security core from validated configuration. Every component
 * receives its settings here; nothing reads the environment afterwards.
 */
export function createContainer(config: AppConfig, deps: ContainerDeps): Container {
  const { accessStore, kvStore, clock } = deps;
  const metrics = deps.metrics ?? new SecurityMetrics();
  const storeCalls = {
    storeTimeoutMs: config.STORE_TIMEOUT_MS,
    storeRetryBackoffMs: config.STORE_RETRY_BACKOFF_MS,
  };

  const tokenService = new TokenService(
    {
      secret: config.JWT_SECRET,
      issuer: config.JWT_ISSUER,
      accessTtlSeconds: config.JWT_ACCESS_TTL_SECONDS,
      refreshTtlSeconds: config.JWT_REFRESH_TTL_SECONDS,
      accessMaxTtlSeconds: config.JWT_ACCESS_MAX_TTL_SECONDS,
      refreshMaxTtlSeconds: config.JWT_REFRESH_MAX_TTL_SECONDS,
      rotation: config.JWT_REFRESH_ROTATION,
      revocation: config.JWT_REVOCATION,
      ...storeCalls,
    },
    { accessStore, kvStore, clock, metrics },
  );

  const permissionResolver = new PermissionResolver(
    accessStore,
    {
      ttlMs: config.PERMISSION_CACHE_TTL_SECONDS * 1000,
      maxEntries: config.PERMISSION_CACHE_MAX_ENTRIES,
      ...storeCalls,
    },
    clock,
  );
  const unsubscribe = deps.accessEvents
    ? permissionResolver.subscribe(deps.accessEvents)
    : () => undefined;

  const backend: RateLimiterBackend =
    config.RATE_LIMIT_BACKEND === 'redis'
      ? {
          type: 'store',
          store: kvStore,
          failPolicy: config.RATE_LIMIT_FAIL_POLICY,
          storeTimeoutMs: config.STORE_TIMEOUT_MS,
        }
      : { type: 'memory', sweepIntervalMs: config.RATE_LIMIT_SWEEP_INTERVAL_SECONDS * 1000 };
  const rules = rateLimitRules(config);
  const limiters: GateLimiters = {
    preAuth: createRateLimiter(rules.preauth, backend, clock),
    routes: {
      auth: createRateLimiter(rules.auth, backend, clock),
      general: createRateLimiter(rules.general, backend, clock),
      admin: createRateLimiter(rules.admin, backend, clock),
      strict: createRateLimiter(rules.strict, backend, clock),
    },
  };

  const gate = new AuthGate(tokenService, permissionResolver, limiters, {
    permissionFailPolicy: config.PERMISSION_FAIL_POLICY,
    metrics,
  });
  const loginService = new LoginService(
    accessStore,
    accessStore,
    tokenService,
    storeCalls,
    metrics,
  );
  const health = new HealthService(deps.healthCheckers ?? [], {
    timeoutMs: config.HEALTH_CHECK_TIMEOUT_MS,
  });

  // Expired keys of an in-process store are otherwise only dropped when read again
  let pruneTimer: NodeJS.Timeout | null = null;
  if (kvStore instanceof MemoryKeyValueStore) {
    const memoryStore = kvStore;
    pruneTimer = setInterval(
      () => memoryStore.prune(),
      config.RATE_LIMIT_SWEEP_INTERVAL_SECONDS * 1000,
    );
    pruneTimer.unref();
  }

  return {
    config,
    tokenService,
    permissionResolver,
    limiters,
    gate,
    loginService,
    metrics,
    health,
    close() {
      unsubscribe();
      if (pruneTimer) clearInterval(pruneTimer);
      limiters.preAuth.close();
      for (const limiter of Object.values(limiters.routes)) {
        limiter.close();
      }
    },
  };
}
