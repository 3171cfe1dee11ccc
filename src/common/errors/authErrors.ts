/**
 * Failure kinds of the security core.
 *
 * The token kinds (`Malformed` .. `PrincipalInactive`) and `StoreUnavailable`
 * are internal: they are logged, then collapsed into one of the client-facing
 * kinds (`Unauthenticated`, `Forbidden`, `RateLimited`, Service Unavailable).
 */
export type AuthErrorKind =
  | 'Malformed'
  | 'BadSignature'
  | 'Expired'
  | 'NotYetValid'
  | 'TokenAlreadyUsed'
  | 'PrincipalInactive'
  | 'Unauthenticated'
  | 'Forbidden'
  | 'RateLimited'
  | 'StoreUnavailable'
  | 'ConfigError';

export class AuthError extends Error {
  public readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = 'AuthError';
    // Restore prototype chain broken by extending built-in Error
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Fatal at startup: a missing secret, an out-of-range TTL, an invalid environment.
 */
export class ConfigError extends AuthError {
  public readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('ConfigError', message);
    this.name = 'ConfigError';
    this.details = details;
  }
}

/**
 * A data store or key-value store call failed, timed out or was cancelled.
 */
export class StoreUnavailableError extends AuthError {
  public readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super('StoreUnavailable', message, options);
    this.name = 'StoreUnavailableError';
    this.operation = operation;
  }
}

export function isAuthError(error: unknown, kind?: AuthErrorKind): error is AuthError {
  return error instanceof AuthError && (kind === undefined || error.kind === kind);
}
