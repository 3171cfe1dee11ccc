import { isAuthError } from '@/common/errors/authErrors';
import logger from '@/lib/logger';
import { SecurityMetrics, type AuthAttemptOutcome } from '@/lib/metrics';
import type {
  PermissionResolver,
  ResolvedAccess,
} from '@/modules/permissions/services/permission.services';
import type {
  FailPolicy,
  RateLimitDecision,
  RateLimiter,
  RouteClass,
} from '@/modules/ratelimit/models/ratelimit.types';
import type { TokenClaims } from '@/modules/tokens/models/token.types';
import type { TokenService } from '@/modules/tokens/services/token.services';

export type DenyReason = 'Unauthenticated' | 'Forbidden' | 'RateLimited' | 'Unavailable';

export interface GateDenial {
  admitted: false;
  reason: DenyReason;
  /** Present when a limiter took part in the decision. */
  rateLimit?: RateLimitDecision;
}

export type GateDecision =
  | { admitted: true; claims: TokenClaims; rateLimit: RateLimitDecision }
  | GateDenial;

export type AnonymousGateDecision = { admitted: true; rateLimit: RateLimitDecision } | GateDenial;

/**
 * What the principal must hold, read from the store (through the permission
 * cache) rather than from the token. Every field given must be satisfied; an
 * empty any-of list is never satisfied.
 */
export interface AccessRule {
  requiredPermission?: string;
  anyPermission?: readonly string[];
  requiredRole?: string;
  anyRole?: readonly string[];
}

export interface GateRequest extends AccessRule {
  /** Raw `Authorization` header value. */
  authorization: string | undefined;
  sourceAddress: string;
  routeClass: RouteClass;
}

export interface GateLimiters {
  /** Per source address, before any token work. */
  preAuth: RateLimiter;
  routes: Record<RouteClass, RateLimiter>;
}

export interface AuthGateOptions {
  permissionFailPolicy: FailPolicy;
  metrics?: SecurityMetrics;
}

type AccessLookup =
  | { resolved: true; access: ResolvedAccess }
  | { resolved: false; admit: boolean };

const OUTCOMES: Record<DenyReason, AuthAttemptOutcome> = {
  Unauthenticated: 'unauthenticated',
  Forbidden: 'forbidden',
  RateLimited: 'rate_limited',
  Unavailable: 'unavailable',
};

function hasRule(rule: AccessRule): boolean {
  return (
    rule.requiredPermission !== undefined ||
    rule.anyPermission !== undefined ||
    rule.requiredRole !== undefined ||
    rule.anyRole !== undefined
  );
}

function satisfies(access: ResolvedAccess, rule: AccessRule): boolean {
  const { permissions, roles } = access;
  return (
    (rule.requiredPermission === undefined || permissions.has(rule.requiredPermission)) &&
    (rule.anyPermission === undefined || rule.anyPermission.some((p) => permissions.has(p))) &&
    (rule.requiredRole === undefined || roles.has(rule.requiredRole)) &&
    (rule.anyRole === undefined || rule.anyRole.some((role) => roles.has(role)))
  );
}

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function extractBearerToken(header: string | undefined): string | null {
  const match = header?.trim().match(BEARER_PATTERN);
  return match?.[1] ?? null;
}

/**
 * Per-request orchestration, in order:
 *
 * 1. pre-auth limit keyed by source address, so floods of bad tokens never
 *    reach validation;
 * 2. bearer extraction and token validation;
 * 3. revocation check, when the token service has it enabled;
 * 4. permission and role rules, under the configured fail policy;
 * 5. route-class limit keyed by principal.
 *
 * Internal failure kinds are logged and counted here, then collapsed into a
 * `DenyReason`.
 */
export class AuthGate {
  private readonly metrics: SecurityMetrics;

  constructor(
    private readonly tokens: TokenService,
    private readonly permissions: PermissionResolver,
    private readonly limiters: GateLimiters,
    private readonly options: AuthGateOptions,
  ) {
    this.metrics = options.metrics ?? new SecurityMetrics();
  }

  async check(signal: AbortSignal, request: GateRequest): Promise<GateDecision> {
    const decision = await this.evaluate(signal, request);
    this.metrics.recordAuthAttempt(
      'token',
      decision.admitted ? 'success' : OUTCOMES[decision.reason],
    );
    return decision;
  }

  private async evaluate(signal: AbortSignal, request: GateRequest): Promise<GateDecision> {
    const preAuthKey = `ip:${request.sourceAddress}`;
    const preAuth = await this.consume(this.limiters.preAuth, signal, preAuthKey);
    if (!preAuth.allowed) {
      return this.rateLimited(preAuth);
    }

    const token = extractBearerToken(request.authorization);
    if (!token) {
      logger.debug({ sourceAddress: request.sourceAddress }, 'Missing or malformed bearer header');
      return { admitted: false, reason: 'Unauthenticated' };
    }

    let claims: TokenClaims;
    try {
      claims = this.tokens.validate(token);
    } catch (error) {
      if (!isAuthError(error)) throw error;
      logger.info({ kind: error.kind, sourceAddress: request.sourceAddress }, 'Token rejected');
      this.metrics.recordTokenRejected(error.kind);
      return { admitted: false, reason: 'Unauthenticated' };
    }
    if (claims.kind !== 'access') {
      logger.info({ principalId: claims.principalId }, 'Refresh token presented as access token');
      return { admitted: false, reason: 'Unauthenticated' };
    }

    if (this.tokens.revocationEnabled) {
      try {
        if (await this.tokens.isRevoked(signal, claims)) {
          logger.info({ principalId: claims.principalId, tokenId: claims.tokenId }, 'Revoked token');
          return { admitted: false, reason: 'Unauthenticated' };
        }
      } catch (error) {
        if (!isAuthError(error, 'StoreUnavailable')) throw error;
        logger.error({ err: error }, 'Revocation check unavailable');
        return { admitted: false, reason: 'Unavailable' };
      }
    }

    if (hasRule(request)) {
      const lookup = await this.resolveAccess(signal, claims);
      if (!lookup.resolved && !lookup.admit) {
        return { admitted: false, reason: 'Unavailable' };
      }
      if (lookup.resolved && !satisfies(lookup.access, request)) {
        logger.info(
          {
            principalId: claims.principalId,
            requiredPermission: request.requiredPermission,
            anyPermission: request.anyPermission,
            requiredRole: request.requiredRole,
            anyRole: request.anyRole,
          },
          'Access rule not satisfied',
        );
        return { admitted: false, reason: 'Forbidden' };
      }
    }

    const limiter = this.limiters.routes[request.routeClass];
    const decision = await this.consume(limiter, signal, `principal:${claims.principalId}`);
    if (!decision.allowed) {
      return this.rateLimited(decision);
    }
    return { admitted: true, claims, rateLimit: decision };
  }

  /** For endpoints reached before authentication, such as login and refresh. */
  async checkAnonymous(
    signal: AbortSignal,
    request: Pick<GateRequest, 'sourceAddress' | 'routeClass'>,
  ): Promise<AnonymousGateDecision> {
    const key = `ip:${request.sourceAddress}`;
    const preAuth = await this.consume(this.limiters.preAuth, signal, key);
    if (!preAuth.allowed) {
      return this.rateLimited(preAuth);
    }
    const decision = await this.consume(this.limiters.routes[request.routeClass], signal, key);
    if (!decision.allowed) {
      return this.rateLimited(decision);
    }
    return { admitted: true, rateLimit: decision };
  }

  private async consume(
    limiter: RateLimiter,
    signal: AbortSignal,
    key: string,
  ): Promise<RateLimitDecision> {
    const decision = await limiter.allow(signal, key);
    const outcome = decision.degraded ? 'degraded' : decision.allowed ? 'allowed' : 'denied';
    this.metrics.recordRateLimitDecision(limiter.rule.name, outcome);
    return decision;
  }

  /** When the store is down, `admit` carries the fail policy. */
  private async resolveAccess(signal: AbortSignal, claims: TokenClaims): Promise<AccessLookup> {
    try {
      const access = await this.permissions.resolve(signal, claims.principalId);
      return { resolved: true, access };
    } catch (error) {
      if (!isAuthError(error, 'StoreUnavailable')) throw error;
      const admit = this.options.permissionFailPolicy === 'open';
      logger.warn(
        { principalId: claims.principalId, err: error },
        admit
          ? 'Permission store unavailable; admitting request (fail-open)'
          : 'Permission store unavailable; rejecting request (fail-closed)',
      );
      return { resolved: false, admit };
    }
  }

  private rateLimited(decision: RateLimitDecision): GateDenial {
    // A limiter that failed closed is an outage, not a quota
    return {
      admitted: false,
      reason: decision.degraded ? 'Unavailable' : 'RateLimited',
      rateLimit: decision,
    };
  }
}
