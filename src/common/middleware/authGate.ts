import { Request, Response, NextFunction } from '@/config/http';
import type { AccessRule, AuthGate, GateDenial } from '@/modules/auth/services/gate.services';
import type { RateLimitDecision, RouteClass } from '@/modules/ratelimit/models/ratelimit.types';

import {
  ForbiddenError,
  HttpError,
  ServiceUnavailableError,
  TooManyRequestsError,
  UnauthorizedError,
} from '../errors/httpErrors';

const signals = new WeakMap<Request, AbortSignal>();

/**
 * Signal that aborts when the client goes away before the response is
 * finished. One per request, shared by every middleware that asks.
 */
export function requestSignal(req: Request, res: Response): AbortSignal {
  const existing = signals.get(req);
  if (existing) return existing;
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  signals.set(req, controller.signal);
  return controller.signal;
}

export function setRateLimitHeaders(res: Response, decision: RateLimitDecision): void {
  res.setHeader('X-RateLimit-Limit', String(decision.limit));
  res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
  res.setHeader('X-RateLimit-Reset', String(Math.ceil(decision.resetAt.getTime() / 1000)));
}

function retryAfterSeconds(decision: RateLimitDecision): number {
  return Math.max(1, Math.ceil((decision.resetAt.getTime() - Date.now()) / 1000));
}

function denialToHttp(denial: GateDenial): HttpError {
  switch (denial.reason) {
    case 'Unauthenticated':
      return new UnauthorizedError();
    case 'Forbidden':
      return new ForbiddenError();
    case 'RateLimited':
      return new TooManyRequestsError(
        'Too Many Requests',
        denial.rateLimit ? retryAfterSeconds(denial.rateLimit) : 1,
      );
    case 'Unavailable':
      return new ServiceUnavailableError();
  }
}

function reject(res: Response, next: NextFunction, denial: GateDenial): void {
  if (denial.rateLimit) {
    setRateLimitHeaders(res, denial.rateLimit);
  }
  next(denialToHttp(denial));
}

export interface AccessRequirement extends AccessRule {
  routeClass: RouteClass;
}

/**
 * Admits the request only if the gate does; sets `req.auth` on success.
 * Permission and role rules are checked against the store, so a grant or
 * revocation applies before the token expires.
 */
export const requireAccess =
  (gate: AuthGate, requirement: AccessRequirement) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const decision = await gate.check(requestSignal(req, res), {
        authorization: req.headers.authorization,
        sourceAddress: req.ip ?? req.socket.remoteAddress ?? 'unknown',
        ...requirement,
      });
      if (!decision.admitted) {
        reject(res, next, decision);
        return;
      }
      setRateLimitHeaders(res, decision.rateLimit);
      req.auth = decision.claims;
      next();
    } catch (error) {
      next(error);
    }
  };

/**
 * Throttling only, for endpoints reached without a token.
 */
export const requireAnonymousAccess =
  (gate: AuthGate, requirement: Pick<AccessRequirement, 'routeClass'>) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const decision = await gate.checkAnonymous(requestSignal(req, res), {
        sourceAddress: req.ip ?? req.socket.remoteAddress ?? 'unknown',
        routeClass: requirement.routeClass,
      });
      if (!decision.admitted) {
        reject(res, next, decision);
        return;
      }
      setRateLimitHeaders(res, decision.rateLimit);
      next();
    } catch (error) {
      next(error);
    }
  };
