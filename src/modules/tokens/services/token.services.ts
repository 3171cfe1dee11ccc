import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { AuthError, ConfigError, isAuthError } from '@/common/errors/authErrors';
import type { KeyValueStore } from '@/common/store/keyValueStore';
import { systemClock, toEpochSeconds, type Clock } from '@/common/utils/clock';
import { callStore, type StoreCallOptions } from '@/common/utils/deadline';
import logger from '@/lib/logger';
import { SecurityMetrics } from '@/lib/metrics';
import type { AccessStore } from '@/modules/access/models/access.types';

import {
  toClaims,
  toPayload,
  tokenPayloadSchema,
  type IssuedToken,
  type Principal,
  type RefreshResult,
  type TokenClaims,
  type TokenKind,
} from '../models/token.types';

const SIGNING_ALGORITHM = 'HS256';
export const MIN_SECRET_LENGTH = 32;

const CONSUMED_KEY_PREFIX = 'token:consumed:';
const REVOKED_KEY_PREFIX = 'token:revoked:';

export interface TokenServiceOptions {
  secret: string;
  issuer: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  accessMaxTtlSeconds: number;
  refreshMaxTtlSeconds: number;
  /** Single-use refresh tokens, tracked in the key-value store. */
  rotation: boolean;
  /** Revoked token ids are honoured by `refresh` and by the gate. */
  revocation: boolean;
  storeTimeoutMs: number;
  storeRetryBackoffMs: number;
}

export interface TokenServiceDeps {
  accessStore: AccessStore;
  kvStore: KeyValueStore;
  clock?: Clock;
  metrics?: SecurityMetrics;
}

/**
 * Issues and validates HS256-signed session tokens.
 *
 * Validation is pure: it reads nothing but the token, the secret and the
 * clock. Only `refresh`, `revoke` and `isRevoked` reach external stores.
 */
export class TokenService {
  private readonly clock: Clock;
  private readonly metrics: SecurityMetrics;

  constructor(
    private readonly options: TokenServiceOptions,
    private readonly deps: TokenServiceDeps,
  ) {
    if (!options.secret || options.secret.length < MIN_SECRET_LENGTH) {
      throw new ConfigError(`Token secret must be at least ${MIN_SECRET_LENGTH} characters long`);
    }
    for (const kind of ['access', 'refresh'] as const) {
      const ttl = this.ttlSeconds(kind);
      const max = this.maxTtlSeconds(kind);
      if (!Number.isInteger(ttl) || ttl <= 0 || ttl > max) {
        throw new ConfigError(`The ${kind} token TTL (${ttl}s) must be between 1 and ${max} seconds`);
      }
    }
    this.clock = deps.clock ?? systemClock;
    this.metrics = deps.metrics ?? new SecurityMetrics();
  }

  get revocationEnabled(): boolean {
    return this.options.revocation;
  }

  private ttlSeconds(kind: TokenKind): number {
    return kind === 'access' ? this.options.accessTtlSeconds : this.options.refreshTtlSeconds;
  }

  private maxTtlSeconds(kind: TokenKind): number {
    return kind === 'access' ? this.options.accessMaxTtlSeconds : this.options.refreshMaxTtlSeconds;
  }

  private storeCall(operation: string, retries: 0 | 1): StoreCallOptions {
    return {
      operation,
      timeoutMs: this.options.storeTimeoutMs,
      retries,
      backoffMs: this.options.storeRetryBackoffMs,
    };
  }

  issue(principal: Principal, roles: string[], kind: TokenKind): IssuedToken {
    const now = toEpochSeconds(this.clock.now());
    const claims: TokenClaims = {
      principalId: principal.id,
      handle: principal.handle,
      roles: [...roles],
      kind,
      issuedAt: now,
      notBefore: now,
      expiresAt: now + this.ttlSeconds(kind),
      issuer: this.options.issuer,
      subject: String(principal.id),
      tokenId: uuidv4(),
    };
    const token = jwt.sign(toPayload(claims), this.options.secret, {
      algorithm: SIGNING_ALGORITHM,
    });
    this.metrics.recordTokenIssued(kind);
    return { token, claims };
  }

  /**
   * @throws {AuthError} `Malformed`, `BadSignature`, `Expired` or `NotYetValid`.
   */
  validate(token: string): TokenClaims {
    const segments = token.split('.');
    if (segments.length < 3) {
      throw new AuthError('Malformed', 'Token must have three segments');
    }
    const header = decodeSegment(segments[0]);
    const payload = decodeSegment(segments[1]);
    if (!header || !payload) {
      throw new AuthError('Malformed', 'Token header or payload could not be decoded');
    }
    // Checked before verification: "none" and public-key algorithms never reach the verifier
    if (header.alg !== SIGNING_ALGORITHM) {
      throw new AuthError('BadSignature', `Unexpected token algorithm: ${String(header.alg)}`);
    }
    // Once header and payload decode, any defect left is in the signature
    const signature = segments.slice(2).join('.');
    if (segments.length !== 3 || !BASE64URL_SEGMENT.test(signature)) {
      throw new AuthError('BadSignature', 'Token signature is not a base64url segment');
    }

    let verified: string | jwt.JwtPayload;
    try {
      verified = jwt.verify(token, this.options.secret, {
        algorithms: [SIGNING_ALGORITHM],
        issuer: this.options.issuer,
        clockTimestamp: toEpochSeconds(this.clock.now()),
      });
    } catch (error) {
      throw toAuthError(error);
    }

    const parsed = tokenPayloadSchema.safeParse(verified);
    if (!parsed.success) {
      throw new AuthError('Malformed', 'Token claims have an invalid shape', {
        cause: parsed.error,
      });
    }
    const claims = toClaims(parsed.data);
    if (!(claims.notBefore <= claims.issuedAt && claims.issuedAt < claims.expiresAt)) {
      throw new AuthError('Malformed', 'Token timestamps are inconsistent');
    }
    if (claims.expiresAt - claims.issuedAt > this.maxTtlSeconds(claims.kind)) {
      throw new AuthError('Malformed', `Token lifetime exceeds the ${claims.kind} maximum`);
    }
    return claims;
  }

  /**
   * Exchanges a refresh token for a new access token. Active status and roles
   * are read again so deactivation and role changes take effect here.
   *
   * With rotation on, the presented token is consumed atomically and a new
   * refresh token is returned; a second presentation fails with
   * `TokenAlreadyUsed`. Without rotation `refreshToken` is null and the
   * presented token stays usable until it expires.
   */
  async refresh(signal: AbortSignal, refreshToken: string): Promise<RefreshResult> {
    try {
      const result = await this.exchange(signal, refreshToken);
      this.metrics.recordAuthAttempt('refresh', 'success');
      return result;
    } catch (error) {
      if (isAuthError(error)) {
        if (error.kind === 'StoreUnavailable') {
          this.metrics.recordAuthAttempt('refresh', 'unavailable');
        } else {
          this.metrics.recordAuthAttempt('refresh', 'unauthenticated');
          this.metrics.recordTokenRejected(error.kind);
        }
      }
      throw error;
    }
  }

  private async exchange(signal: AbortSignal, refreshToken: string): Promise<RefreshResult> {
    const claims = this.validate(refreshToken);
    if (claims.kind !== 'refresh') {
      throw new AuthError('Malformed', 'An access token cannot be used to refresh');
    }
    if (this.options.revocation && (await this.isRevoked(signal, claims))) {
      throw new AuthError('Unauthenticated', 'Refresh token has been revoked');
    }

    const { accessStore, kvStore } = this.deps;
    const active = await callStore(
      signal,
      this.storeCall('access.isPrincipalActive', 1),
      (attemptSignal) => accessStore.isPrincipalActive(attemptSignal, claims.principalId),
    );
    if (!active) {
      throw new AuthError('PrincipalInactive', `Principal ${claims.principalId} is not active`);
    }
    const roles = await callStore(
      signal,
      this.storeCall('access.getRolesForPrincipal', 1),
      (attemptSignal) => accessStore.getRolesForPrincipal(attemptSignal, claims.principalId),
    );

    const principal = { id: claims.principalId, handle: claims.handle };
    const roleNames = roles.map((role) => role.name);

    if (!this.options.rotation) {
      return { accessToken: this.issue(principal, roleNames, 'access'), refreshToken: null };
    }

    const firstUse = await callStore(
      signal,
      this.storeCall('tokens.consumeRefreshToken', 0),
      (attemptSignal) =>
        kvStore.setIfAbsent(
          attemptSignal,
          `${CONSUMED_KEY_PREFIX}${claims.tokenId}`,
          String(claims.principalId),
          this.remainingLifetimeMs(claims),
        ),
    );
    if (!firstUse) {
      logger.warn(
        { principalId: claims.principalId, tokenId: claims.tokenId },
        'Refresh token presented twice',
      );
      throw new AuthError('TokenAlreadyUsed', 'Refresh token has already been used');
    }

    return {
      accessToken: this.issue(principal, roleNames, 'access'),
      refreshToken: this.issue(principal, roleNames, 'refresh'),
    };
  }

  /** Blacklists the token id until the token would have expired anyway. */
  async revoke(signal: AbortSignal, claims: TokenClaims): Promise<void> {
    const ttlMs = this.remainingLifetimeMs(claims);
    if (ttlMs <= 0) return;
    await callStore(signal, this.storeCall('tokens.revoke', 0), (attemptSignal) =>
      this.deps.kvStore.setWithTtl(attemptSignal, `${REVOKED_KEY_PREFIX}${claims.tokenId}`, '1', ttlMs),
    );
  }

  async isRevoked(signal: AbortSignal, claims: TokenClaims): Promise<boolean> {
    const value = await callStore(signal, this.storeCall('tokens.isRevoked', 1), (attemptSignal) =>
      this.deps.kvStore.get(attemptSignal, `${REVOKED_KEY_PREFIX}${claims.tokenId}`),
    );
    return value !== null;
  }

  private remainingLifetimeMs(claims: TokenClaims): number {
    return claims.expiresAt * 1000 - this.clock.now();
  }
}

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+$/;

const jsonObjectSchema = z.record(z.unknown());

function decodeSegment(segment: string): Record<string, unknown> | null {
  if (!BASE64URL_SEGMENT.test(segment)) return null;
  let value: unknown;
  try {
    value = JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return null;
  }
  const parsed = jsonObjectSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function toAuthError(error: unknown): AuthError {
  // TokenExpiredError and NotBeforeError extend JsonWebTokenError: test them first
  if (error instanceof jwt.TokenExpiredError) {
    return new AuthError('Expired', 'Token has expired', { cause: error });
  }
  if (error instanceof jwt.NotBeforeError) {
    return new AuthError('NotYetValid', 'Token is not valid yet', { cause: error });
  }
  if (error instanceof jwt.JsonWebTokenError) {
    const signatureFailures = ['invalid signature', 'invalid algorithm', 'jwt signature is required'];
    if (signatureFailures.includes(error.message)) {
      return new AuthError('BadSignature', 'Token signature is invalid', { cause: error });
    }
  }
  return new AuthError('Malformed', 'Token could not be verified', { cause: error });
}
