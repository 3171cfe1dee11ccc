import { z } from 'zod';

export type TokenKind = 'access' | 'refresh';

/**
 * The identity a request acts as. The role list embedded in a token is only a
 * snapshot; high-stakes checks go through the PermissionResolver.
 */
export interface Principal {
  id: number;
  /** Stable handle (login name / email). */
  handle: string;
}

export interface TokenClaims {
  principalId: number;
  handle: string;
  roles: string[];
  kind: TokenKind;
  /** Epoch seconds. */
  issuedAt: number;
  notBefore: number;
  expiresAt: number;
  issuer: string;
  subject: string;
  /** Unique id, used for rotation and revocation tracking. */
  tokenId: string;
}

export interface IssuedToken {
  token: string;
  claims: TokenClaims;
}

export interface RefreshResult {
  accessToken: IssuedToken;
  /** The replacement refresh token when rotation is on, otherwise null. */
  refreshToken: IssuedToken | null;
}

// Wire payload: registered JWT names plus our private claims
export const tokenPayloadSchema = z.object({
  sub: z.string().regex(/^[1-9]\d*$/, 'sub must be a positive integer id'),
  handle: z.string().min(1),
  roles: z.array(z.string()),
  kind: z.enum(['access', 'refresh']),
  iat: z.number().int(),
  nbf: z.number().int(),
  exp: z.number().int(),
  iss: z.string().min(1),
  jti: z.string().uuid(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export function toClaims(payload: TokenPayload): TokenClaims {
  return {
    principalId: Number(payload.sub),
    handle: payload.handle,
    roles: payload.roles,
    kind: payload.kind,
    issuedAt: payload.iat,
    notBefore: payload.nbf,
    expiresAt: payload.exp,
    issuer: payload.iss,
    subject: payload.sub,
    tokenId: payload.jti,
  };
}

export function toPayload(claims: TokenClaims): TokenPayload {
  return {
    sub: claims.subject,
    handle: claims.handle,
    roles: claims.roles,
    kind: claims.kind,
    iat: claims.issuedAt,
    nbf: claims.notBefore,
    exp: claims.expiresAt,
    iss: claims.issuer,
    jti: claims.tokenId,
  };
}
