import bcrypt from 'bcryptjs';

import { isAuthError } from '@/common/errors/authErrors';
import { UnauthorizedError } from '@/common/errors/httpErrors';
import { callStore, type StoreCallOptions } from '@/common/utils/deadline';
import logger from '@/lib/logger';
import { SecurityMetrics } from '@/lib/metrics';
import type { AccessStore, CredentialStore } from '@/modules/access/models/access.types';
import type { IssuedToken, TokenClaims } from '@/modules/tokens/models/token.types';
import type { TokenService } from '@/modules/tokens/services/token.services';

const BCRYPT_SALT_ROUNDS = 10;

export interface LoginResult {
  accessToken: IssuedToken;
  refreshToken: IssuedToken;
}

export interface LoginServiceOptions {
  storeTimeoutMs: number;
  storeRetryBackoffMs: number;
}

/**
 * Exchanges credentials for a token pair, and revokes tokens on logout.
 */
export class LoginService {
  // Compared against when the handle is unknown, so both paths cost one bcrypt round
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly credentials: CredentialStore,
    private readonly accessStore: AccessStore,
    private readonly tokens: TokenService,
    private readonly options: LoginServiceOptions,
    private readonly metrics: SecurityMetrics = new SecurityMetrics(),
  ) {}

  private readCall(operation: string): StoreCallOptions {
    return {
      operation,
      timeoutMs: this.options.storeTimeoutMs,
      retries: 1,
      backoffMs: this.options.storeRetryBackoffMs,
    };
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= bcrypt.hash('not-a-real-password', BCRYPT_SALT_ROUNDS);
    return this.dummyHash;
  }

  /**
   * Authenticates a principal by handle and password. Every credential
   * failure answers the same 401.
   */
  async login(signal: AbortSignal, handle: string, password: string): Promise<LoginResult> {
    try {
      const result = await this.authenticate(signal, handle, password);
      this.metrics.recordAuthAttempt('login', 'success');
      return result;
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        this.metrics.recordAuthAttempt('login', 'unauthenticated');
      } else if (isAuthError(error, 'StoreUnavailable')) {
        this.metrics.recordAuthAttempt('login', 'unavailable');
      }
      throw error;
    }
  }

  private async authenticate(
    signal: AbortSignal,
    handle: string,
    password: string,
  ): Promise<LoginResult> {
    const normalizedHandle = handle.toLowerCase().trim();
    const principal = await callStore(
      signal,
      this.readCall('access.findCredentialsByHandle'),
      (attemptSignal) => this.credentials.findCredentialsByHandle(attemptSignal, normalizedHandle),
    );

    if (!principal) {
      await bcrypt.compare(password, await this.getDummyHash());
      throw new UnauthorizedError('Invalid handle or password.');
    }

    const isPasswordValid = await bcrypt.compare(password, principal.passwordHash);
    if (!isPasswordValid) {
      logger.warn({ principalId: principal.id }, 'Incorrect password');
      throw new UnauthorizedError('Invalid handle or password.');
    }
    if (!principal.active) {
      logger.warn({ principalId: principal.id }, 'Login refused for inactive principal');
      throw new UnauthorizedError('Invalid handle or password.');
    }

    const roles = await callStore(
      signal,
      this.readCall('access.getRolesForPrincipal'),
      (attemptSignal) => this.accessStore.getRolesForPrincipal(attemptSignal, principal.id),
    );
    const roleNames = roles.map((role) => role.name);
    const identity = { id: principal.id, handle: principal.handle };

    logger.info({ principalId: principal.id }, 'Login successful');
    return {
      accessToken: this.tokens.issue(identity, roleNames, 'access'),
      refreshToken: this.tokens.issue(identity, roleNames, 'refresh'),
    };
  }

  /**
   * Revokes the access token and, when given and owned by the same principal,
   * the refresh token. A no-op unless revocation is enabled.
   */
  async logout(signal: AbortSignal, accessClaims: TokenClaims, refreshToken?: string): Promise<void> {
    if (!this.tokens.revocationEnabled) return;
    await this.tokens.revoke(signal, accessClaims);

    if (!refreshToken) return;
    let refreshClaims: TokenClaims;
    try {
      refreshClaims = this.tokens.validate(refreshToken);
    } catch (error) {
      if (!isAuthError(error)) throw error;
      // Already unusable: nothing to revoke
      logger.debug({ kind: error.kind }, 'Ignoring invalid refresh token on logout');
      return;
    }
    if (refreshClaims.kind === 'refresh' && refreshClaims.principalId === accessClaims.principalId) {
      await this.tokens.revoke(signal, refreshClaims);
    }
  }

  static hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, BCRYPT_SALT_ROUNDS);
  }
}
