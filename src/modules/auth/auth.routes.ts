import { z } from 'zod';

import { UnauthorizedError } from '@/common/errors/httpErrors';
import {
  requestSignal,
  requireAccess,
  requireAnonymousAccess,
} from '@/common/middleware/authGate';
import { validateRequest } from '@/common/middleware/validation';
import { BaseRouter } from '@/common/routing/BaseRouter';
import { Request, Response, NextFunction } from '@/config/http';
import type { PermissionResolver } from '@/modules/permissions/services/permission.services';
import type { IssuedToken } from '@/modules/tokens/models/token.types';
import type { TokenService } from '@/modules/tokens/services/token.services';

import type { AuthGate } from './services/gate.services';
import type { LoginService } from './services/login.services';

const loginSchema = z.object({
  handle: z.string().min(1).max(100),
  password: z.string().min(1).max(200),
});

const refreshSchema = z.object({
  refreshToken: z.string().min(1),
});

const logoutSchema = z.object({
  refreshToken: z.string().min(1).optional(),
});

function toTokenResponse(token: IssuedToken) {
  return { token: token.token, expiresAt: token.claims.expiresAt };
}

export interface AuthRouterDeps {
  gate: AuthGate;
  loginService: LoginService;
  tokenService: TokenService;
  permissionResolver: PermissionResolver;
}

/**
 * /auth endpoints. Login and refresh are throttled per source address under
 * the `auth` class; the others need a valid access token.
 */
export class AuthRouter extends BaseRouter {
  constructor(private readonly deps: AuthRouterDeps) {
    super();
    const { gate } = deps;

    this.router.post(
      '/login',
      requireAnonymousAccess(gate, { routeClass: 'auth' }),
      validateRequest(loginSchema),
      (req, res, next) => this.login(req, res, next),
    );
    this.router.post(
      '/refresh',
      requireAnonymousAccess(gate, { routeClass: 'auth' }),
      validateRequest(refreshSchema),
      (req, res, next) => this.refresh(req, res, next),
    );
    this.router.post(
      '/logout',
      requireAccess(gate, { routeClass: 'general' }),
      validateRequest(logoutSchema),
      (req, res, next) => this.logout(req, res, next),
    );
    this.router.get('/me', requireAccess(gate, { routeClass: 'general' }), (req, res, next) =>
      this.me(req, res, next),
    );
  }

  /**
   * POST /login - Authenticate a principal and return an access/refresh token pair.
   */
  async login(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.pipe(req, res, next, async () => {
      const { handle, password } = loginSchema.parse(req.body);
      const result = await this.deps.loginService.login(requestSignal(req, res), handle, password);
      return {
        tokenType: 'Bearer',
        accessToken: toTokenResponse(result.accessToken),
        refreshToken: toTokenResponse(result.refreshToken),
      };
    });
  }

  /**
   * POST /refresh - Exchange a refresh token for a new access token.
   * `refreshToken` is null in the response unless rotation is enabled.
   */
  async refresh(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.pipe(req, res, next, async () => {
      const { refreshToken } = refreshSchema.parse(req.body);
      const result = await this.deps.tokenService.refresh(requestSignal(req, res), refreshToken);
      return {
        tokenType: 'Bearer',
        accessToken: toTokenResponse(result.accessToken),
        refreshToken: result.refreshToken ? toTokenResponse(result.refreshToken) : null,
      };
    });
  }

  /**
   * POST /logout - Revoke the presented tokens (when revocation is enabled).
   */
  async logout(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.pipe(req, res, next, async () => {
      const { refreshToken } = logoutSchema.parse(req.body ?? {});
      const claims = this.requireClaims(req);
      await this.deps.loginService.logout(requestSignal(req, res), claims, refreshToken);
      return 'Logout successful';
    });
  }

  /**
   * GET /me - The authenticated principal and its current effective permissions.
   */
  async me(req: Request, res: Response, next: NextFunction): Promise<void> {
    await this.pipe(req, res, next, async () => {
      const claims = this.requireClaims(req);
      const permissions = await this.deps.permissionResolver.expand(
        requestSignal(req, res),
        claims.principalId,
      );
      return {
        id: claims.principalId,
        handle: claims.handle,
        roles: claims.roles,
        permissions: [...permissions].sort(),
        expiresAt: claims.expiresAt,
      };
    });
  }

  private requireClaims(req: Request) {
    if (!req.auth) {
      // requireAccess runs first on every route that gets here
      throw new UnauthorizedError();
    }
    return req.auth;
  }
}
