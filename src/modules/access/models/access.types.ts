import { EventEmitter } from 'node:events';

/**
 * Read side of the principal / role / permission data store. Every call may
 * block on I/O, takes the caller's signal and may fail; callers wrap it with
 * `callStore` so failures surface as `StoreUnavailableError`.
 */
export interface AccessStore {
  /** Roles currently assigned to the principal (empty for unknown ids). */
  getRolesForPrincipal(signal: AbortSignal, principalId: number): Promise<RoleRef[]>;
  /** Permission names granted to the role. */
  getPermissionsForRole(signal: AbortSignal, roleId: number): Promise<string[]>;
  /** False for unknown, deactivated or deleted principals. */
  isPrincipalActive(signal: AbortSignal, principalId: number): Promise<boolean>;
}

export interface RoleRef {
  id: number;
  name: string;
}

export interface PrincipalCredentials {
  id: number;
  handle: string;
  passwordHash: string;
  active: boolean;
}

export interface CredentialStore {
  findCredentialsByHandle(signal: AbortSignal, handle: string): Promise<PrincipalCredentials | null>;
}

export type AccessChange =
  | { type: 'user-role'; principalId: number; roleId: number }
  | { type: 'role-permission'; roleId: number; permissionId: number };

/**
 * Mutations of role assignments and grants. Emitted after the write commits.
 */
export class AccessEvents {
  private readonly emitter = new EventEmitter();

  emit(change: AccessChange): void {
    this.emitter.emit('change', change);
  }

  on(listener: (change: AccessChange) => void): () => void {
    this.emitter.on('change', listener);
    return () => {
      this.emitter.off('change', listener);
    };
  }

  get listenerCount(): number {
    return this.emitter.listenerCount('change');
  }
}
