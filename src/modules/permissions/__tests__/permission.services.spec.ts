import { describe, it, expect, beforeEach } from 'vitest';

import { AccessEvents } from '@/modules/access/models/access.types';
import { InMemoryAccessStore, ManualClock, deferred, neverAborted } from '@/tests/fakes';

import { PermissionResolver, type PermissionResolverOptions } from '../services/permission.services';

const options: PermissionResolverOptions = {
  ttlMs: 30_000,
  maxEntries: 100,
  storeTimeoutMs: 2000,
  storeRetryBackoffMs: 0,
};

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('PermissionResolver', () => {
  let clock: ManualClock;
  let store: InMemoryAccessStore;
  let resolver: PermissionResolver;

  beforeEach(() => {
    clock = new ManualClock();
    store = new InMemoryAccessStore()
      .addRole(1, 'editor', ['posts:write', 'posts:read'])
      .addRole(2, 'viewer', ['posts:read', 'comments:read'])
      .addPrincipal({ id: 42, handle: 'ada', passwordHash: 'unused', active: true }, [1, 2])
      .addPrincipal({ id: 7, handle: 'grace', passwordHash: 'unused', active: true }, [2]);
    resolver = new PermissionResolver(store, options, clock);
  });

  it('expands roles into the union of their permissions', async () => {
    const permissions = await resolver.expand(neverAborted(), 42);
    expect([...permissions].sort()).toEqual(['comments:read', 'posts:read', 'posts:write']);
    expect(await resolver.hasPermission(neverAborted(), 7, 'posts:write')).toBe(false);
    expect(await resolver.hasPermission(neverAborted(), 7, 'comments:read')).toBe(true);
  });

  it('answers role membership from the store', async () => {
    expect(await resolver.hasRole(neverAborted(), 42, 'editor')).toBe(true);
    expect(await resolver.hasRole(neverAborted(), 7, 'editor')).toBe(false);

    store.removeRole(42, 1);
    resolver.invalidatePrincipal(42);
    expect(await resolver.hasRole(neverAborted(), 42, 'editor')).toBe(false);
  });

  it('resolves an unknown principal to no permissions', async () => {
    expect((await resolver.expand(neverAborted(), 999)).size).toBe(0);
  });

  it('serves repeated lookups from the cache until the TTL elapses', async () => {
    await resolver.expand(neverAborted(), 42);
    clock.advance(29_999);
    await resolver.expand(neverAborted(), 42);
    expect(store.calls.getRolesForPrincipal).toBe(1);

    clock.advance(1);
    await resolver.expand(neverAborted(), 42);
    expect(store.calls.getRolesForPrincipal).toBe(2);
  });

  it('answers false right after a role is removed and the principal invalidated', async () => {
    expect(await resolver.hasPermission(neverAborted(), 42, 'posts:write')).toBe(true);

    store.removeRole(42, 1);
    resolver.invalidatePrincipal(42);

    expect(await resolver.hasPermission(neverAborted(), 42, 'posts:write')).toBe(false);
  });

  it('invalidates every principal holding a role when its grants change', async () => {
    await resolver.expand(neverAborted(), 42);
    await resolver.expand(neverAborted(), 7);

    store.revokePermission(2, 'comments:read');
    resolver.invalidateRole(2);

    expect(await resolver.hasPermission(neverAborted(), 42, 'comments:read')).toBe(false);
    expect(await resolver.hasPermission(neverAborted(), 7, 'comments:read')).toBe(false);
  });

  it('answers true right after a grant to a held role is invalidated', async () => {
    expect(await resolver.hasPermission(neverAborted(), 7, 'posts:publish')).toBe(false);

    store.grantPermission(2, 'posts:publish');
    resolver.invalidateRole(2);

    expect(await resolver.hasPermission(neverAborted(), 7, 'posts:publish')).toBe(true);
  });

  it('picks up a grant announced through access events', async () => {
    const events = new AccessEvents();
    resolver.subscribe(events);
    expect(await resolver.hasPermission(neverAborted(), 42, 'posts:publish')).toBe(false);

    store.grantPermission(1, 'posts:publish');
    events.emit({ type: 'role-permission', roleId: 1, permissionId: 9 });

    expect(await resolver.hasPermission(neverAborted(), 42, 'posts:publish')).toBe(true);
  });

  it('keeps principals without the role cached on role invalidation', async () => {
    await resolver.expand(neverAborted(), 42);
    await resolver.expand(neverAborted(), 7);

    resolver.invalidateRole(1);

    expect(resolver.size).toBe(1);
    await resolver.expand(neverAborted(), 7);
    expect(store.calls.getRolesForPrincipal).toBe(2);
  });

  it('drops everything on invalidateAll', async () => {
    await resolver.expand(neverAborted(), 42);
    await resolver.expand(neverAborted(), 7);
    resolver.invalidateAll();
    expect(resolver.size).toBe(0);
  });

  it('invalidates on access events until unsubscribed', async () => {
    const events = new AccessEvents();
    const unsubscribe = resolver.subscribe(events);
    await resolver.expand(neverAborted(), 42);

    store.removeRole(42, 1);
    events.emit({ type: 'user-role', principalId: 42, roleId: 1 });
    expect(await resolver.hasPermission(neverAborted(), 42, 'posts:write')).toBe(false);

    store.revokePermission(2, 'posts:read');
    events.emit({ type: 'role-permission', roleId: 2, permissionId: 5 });
    expect(await resolver.hasPermission(neverAborted(), 42, 'posts:read')).toBe(false);

    unsubscribe();
    expect(events.listenerCount).toBe(0);
  });

  it('shares one store round trip between concurrent misses', async () => {
    const hold = deferred();
    store.gate = hold.promise;

    const lookups = Array.from({ length: 50 }, () => resolver.expand(neverAborted(), 42));
    await flush();
    hold.release();
    const results = await Promise.all(lookups);

    expect(store.calls.getRolesForPrincipal).toBe(1);
    expect(store.calls.getPermissionsForRole).toBe(2);
    expect(new Set(results).size).toBe(1);
  });

  it('does not cache a result fetched across an invalidation', async () => {
    const hold = deferred();
    store.gate = hold.promise;

    const lookup = resolver.expand(neverAborted(), 42);
    await flush();
    resolver.invalidatePrincipal(42);
    hold.release();
    await lookup;

    expect(resolver.size).toBe(0);
    store.gate = null;
    await resolver.expand(neverAborted(), 42);
    expect(store.calls.getRolesForPrincipal).toBe(2);
  });

  it('lets one caller abandon a shared fetch without failing the others', async () => {
    const hold = deferred();
    store.gate = hold.promise;
    const controller = new AbortController();

    const abandoned = resolver.expand(controller.signal, 42);
    const patient = resolver.expand(neverAborted(), 42);
    await flush();
    controller.abort();

    await expect(abandoned).rejects.toMatchObject({ kind: 'StoreUnavailable' });
    hold.release();
    expect((await patient).has('posts:write')).toBe(true);
    expect(resolver.size).toBe(1);
  });

  it('refuses to start for a caller that already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(resolver.expand(controller.signal, 42)).rejects.toMatchObject({
      kind: 'StoreUnavailable',
    });
    expect(store.calls.getRolesForPrincipal).toBe(0);
  });

  it('surfaces store failures as StoreUnavailable after one retry, without caching', async () => {
    store.failure = new Error('connection reset');
    await expect(resolver.expand(neverAborted(), 42)).rejects.toMatchObject({
      kind: 'StoreUnavailable',
    });
    expect(store.calls.getRolesForPrincipal).toBe(2);
    expect(resolver.size).toBe(0);

    store.failure = null;
    expect((await resolver.expand(neverAborted(), 42)).has('posts:write')).toBe(true);
  });

  it('evicts the oldest entry beyond the size cap', async () => {
    const small = new PermissionResolver(store, { ...options, maxEntries: 2 }, clock);
    store.addPrincipal({ id: 8, handle: 'linus', passwordHash: 'unused', active: true }, [2]);

    await small.expand(neverAborted(), 42);
    await small.expand(neverAborted(), 7);
    await small.expand(neverAborted(), 8);
    expect(small.size).toBe(2);

    await small.expand(neverAborted(), 42);
    expect(store.calls.getRolesForPrincipal).toBe(4);
  });
});
