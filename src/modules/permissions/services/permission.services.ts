import { StoreUnavailableError } from '@/common/errors/authErrors';
import { SingleFlight } from '@/common/utils';
import { systemClock, type Clock } from '@/common/utils/clock';
import { abandonOnAbort, callStore, type StoreCallOptions } from '@/common/utils/deadline';
import logger from '@/lib/logger';
import type { AccessEvents, AccessStore } from '@/modules/access/models/access.types';

export interface PermissionResolverOptions {
  ttlMs: number;
  maxEntries: number;
  storeTimeoutMs: number;
  storeRetryBackoffMs: number;
}

/** A principal's current role names and effective permissions. */
export interface ResolvedAccess {
  permissions: ReadonlySet<string>;
  roles: ReadonlySet<string>;
}

interface PermissionCacheEntry extends ResolvedAccess {
  roleIds: number[];
  fetchedAt: number;
}

/**
 * Resolves a principal's effective permissions: the union of the grants of
 * every role assigned to it.
 *
 * Results are cached per principal for `ttlMs`, and concurrent misses for the
 * same principal share one store round trip. Invalidation drops the cached
 * entry and marks fetches already in flight as stale, so a permission set
 * read before a role change is never cached after it.
 */
export class PermissionResolver {
  private readonly entries = new Map<number, PermissionCacheEntry>();
  private readonly principalsByRole = new Map<number, Set<number>>();
  private readonly flights = new SingleFlight<PermissionCacheEntry>();

  // Invalidation bookkeeping for fetches in flight
  private epoch = 0;
  private allInvalidatedAt = 0;
  private readonly invalidatedAt = new Map<number, number>();
  private readonly fetching = new Map<number, number>();

  private readonly clock: Clock;

  constructor(
    private readonly store: AccessStore,
    private readonly options: PermissionResolverOptions,
    clock: Clock = systemClock,
  ) {
    this.clock = clock;
  }

  /**
   * @throws {StoreUnavailableError} when the store cannot answer or `signal`
   * aborts first. Callers apply their fail policy.
   */
  async resolve(signal: AbortSignal, principalId: number): Promise<ResolvedAccess> {
    if (signal.aborted) {
      throw new StoreUnavailableError('permissions.resolve', 'permissions.resolve cancelled by caller');
    }
    const cached = this.entries.get(principalId);
    if (cached) {
      if (this.clock.now() - cached.fetchedAt < this.options.ttlMs) {
        return cached;
      }
      this.dropEntry(principalId);
    }

    // The shared fetch ignores this caller's signal; only the wait is abandoned
    return abandonOnAbort(
      signal,
      this.flights.do(String(principalId), () => this.load(principalId)),
      () => new StoreUnavailableError('permissions.resolve', 'permissions.resolve cancelled by caller'),
    );
  }

  async expand(signal: AbortSignal, principalId: number): Promise<ReadonlySet<string>> {
    return (await this.resolve(signal, principalId)).permissions;
  }

  async hasPermission(signal: AbortSignal, principalId: number, permission: string): Promise<boolean> {
    const permissions = await this.expand(signal, principalId);
    return permissions.has(permission);
  }

  /** Checks the roles currently assigned in the store, not a token's snapshot. */
  async hasRole(signal: AbortSignal, principalId: number, role: string): Promise<boolean> {
    return (await this.resolve(signal, principalId)).roles.has(role);
  }

  invalidatePrincipal(principalId: number): void {
    this.dropEntry(principalId);
    this.epoch++;
    if (this.fetching.has(principalId)) {
      this.invalidatedAt.set(principalId, this.epoch);
    }
    this.flights.forget(String(principalId));
  }

  /**
   * Invalidates every cached principal holding `roleId`. Fetches in flight
   * cannot tell yet whether they hold it, so they are all marked stale.
   */
  invalidateRole(roleId: number): void {
    const affected = new Set<number>([
      ...(this.principalsByRole.get(roleId) ?? []),
      ...this.fetching.keys(),
    ]);
    for (const principalId of affected) {
      this.invalidatePrincipal(principalId);
    }
  }

  invalidateAll(): void {
    this.entries.clear();
    this.principalsByRole.clear();
    this.epoch++;
    this.allInvalidatedAt = this.epoch;
    this.flights.forgetAll();
  }

  /**
   * Invalidates on every role assignment or grant change.
   * @returns unsubscribe
   */
  subscribe(events: AccessEvents): () => void {
    return events.on((change) => {
      if (change.type === 'user-role') {
        logger.debug({ principalId: change.principalId }, 'Role assignment changed');
        this.invalidatePrincipal(change.principalId);
      } else {
        logger.debug({ roleId: change.roleId }, 'Role grants changed');
        this.invalidateRole(change.roleId);
      }
    });
  }

  get size(): number {
    return this.entries.size;
  }

  private readCall(operation: string): StoreCallOptions {
    return {
      operation,
      timeoutMs: this.options.storeTimeoutMs,
      retries: 1,
      backoffMs: this.options.storeRetryBackoffMs,
    };
  }

  private async load(principalId: number): Promise<PermissionCacheEntry> {
    const startedAt = this.epoch;
    const fetchedAt = this.clock.now();
    this.fetching.set(principalId, (this.fetching.get(principalId) ?? 0) + 1);
    // Never aborted: the per-attempt timeout still bounds each call
    const detached = new AbortController().signal;
    try {
      const roles = await callStore(
        detached,
        this.readCall('access.getRolesForPrincipal'),
        (attemptSignal) => this.store.getRolesForPrincipal(attemptSignal, principalId),
      );
      const grants = await Promise.all(
        roles.map((role) =>
          callStore(detached, this.readCall('access.getPermissionsForRole'), (attemptSignal) =>
            this.store.getPermissionsForRole(attemptSignal, role.id),
          ),
        ),
      );
      const entry: PermissionCacheEntry = {
        permissions: new Set(grants.flat()),
        roles: new Set(roles.map((role) => role.name)),
        roleIds: roles.map((role) => role.id),
        fetchedAt,
      };
      if (this.isStale(principalId, startedAt)) {
        logger.debug({ principalId }, 'Permission fetch invalidated while in flight; not cached');
      } else {
        this.remember(principalId, entry);
      }
      return entry;
    } finally {
      const remaining = (this.fetching.get(principalId) ?? 1) - 1;
      if (remaining > 0) {
        this.fetching.set(principalId, remaining);
      } else {
        this.fetching.delete(principalId);
        this.invalidatedAt.delete(principalId);
      }
    }
  }

  private isStale(principalId: number, startedAt: number): boolean {
    return (
      this.allInvalidatedAt > startedAt || (this.invalidatedAt.get(principalId) ?? 0) > startedAt
    );
  }

  private remember(principalId: number, entry: PermissionCacheEntry): void {
    this.dropEntry(principalId);
    this.entries.set(principalId, entry);
    for (const roleId of entry.roleIds) {
      const holders = this.principalsByRole.get(roleId) ?? new Set<number>();
      holders.add(principalId);
      this.principalsByRole.set(roleId, holders);
    }
    // Map iteration follows insertion order: the first key is the oldest entry
    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.dropEntry(oldest.value);
    }
  }

  private dropEntry(principalId: number): void {
    const entry = this.entries.get(principalId);
    if (!entry) return;
    this.entries.delete(principalId);
    for (const roleId of entry.roleIds) {
      const holders = this.principalsByRole.get(roleId);
      holders?.delete(principalId);
      if (holders && holders.size === 0) {
        this.principalsByRole.delete(roleId);
      }
    }
  }
}
