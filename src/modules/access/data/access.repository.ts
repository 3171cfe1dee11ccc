import { DataSource, In, IsNull, Repository } from 'typeorm';

import {
  Permission,
  Principal,
  Role,
  RolePermission,
  UserRole,
} from '../models/access.entity';
import {
  AccessEvents,
  type AccessStore,
  type CredentialStore,
  type PrincipalCredentials,
  type RoleRef,
} from '../models/access.types';

/**
 * TypeORM implementation of the access data store.
 * TypeORM queries cannot be cancelled once sent: the signal is checked before
 * each one and `callStore` abandons the wait.
 */
export class AccessRepository implements AccessStore, CredentialStore {
  private readonly principals: Repository<Principal>;
  private readonly roles: Repository<Role>;
  private readonly permissions: Repository<Permission>;
  private readonly userRoles: Repository<UserRole>;
  private readonly rolePermissions: Repository<RolePermission>;

  /**
   * @param events - receives one change per association write, for cache invalidation.
   */
  constructor(
    dataSource: DataSource,
    private readonly events: AccessEvents = new AccessEvents(),
  ) {
    this.principals = dataSource.getRepository(Principal);
    this.roles = dataSource.getRepository(Role);
    this.permissions = dataSource.getRepository(Permission);
    this.userRoles = dataSource.getRepository(UserRole);
    this.rolePermissions = dataSource.getRepository(RolePermission);
  }

  async getRolesForPrincipal(signal: AbortSignal, principalId: number): Promise<RoleRef[]> {
    signal.throwIfAborted();
    const links = await this.userRoles.find({ where: { principalId } });
    if (links.length === 0) return [];
    signal.throwIfAborted();
    const roles = await this.roles.find({
      where: { id: In(links.map((link) => link.roleId)), deletedAt: IsNull() },
      order: { id: 'ASC' },
    });
    return roles.map((role) => ({ id: role.id, name: role.name }));
  }

  async getPermissionsForRole(signal: AbortSignal, roleId: number): Promise<string[]> {
    signal.throwIfAborted();
    const links = await this.rolePermissions.find({ where: { roleId } });
    if (links.length === 0) return [];
    signal.throwIfAborted();
    const permissions = await this.permissions.find({
      where: { id: In(links.map((link) => link.permissionId)), deletedAt: IsNull() },
    });
    return permissions.map((permission) => permission.name);
  }

  async isPrincipalActive(signal: AbortSignal, principalId: number): Promise<boolean> {
    signal.throwIfAborted();
    const principal = await this.principals.findOne({
      where: { id: principalId, deletedAt: IsNull() },
    });
    return principal?.active === true;
  }

  async findCredentialsByHandle(
    signal: AbortSignal,
    handle: string,
  ): Promise<PrincipalCredentials | null> {
    signal.throwIfAborted();
    const principal = await this.principals.findOne({
      where: { handle: handle.toLowerCase().trim(), deletedAt: IsNull() },
      select: ['id', 'handle', 'passwordHash', 'active'],
    });
    if (!principal) return null;
    return {
      id: principal.id,
      handle: principal.handle,
      passwordHash: principal.passwordHash,
      active: principal.active,
    };
  }

  async assignRole(principalId: number, roleId: number): Promise<void> {
    await this.userRoles.save(this.userRoles.create({ principalId, roleId }));
    this.events.emit({ type: 'user-role', principalId, roleId });
  }

  async removeRole(principalId: number, roleId: number): Promise<void> {
    await this.userRoles.delete({ principalId, roleId });
    this.events.emit({ type: 'user-role', principalId, roleId });
  }

  async grantPermission(roleId: number, permissionId: number): Promise<void> {
    await this.rolePermissions.save(this.rolePermissions.create({ roleId, permissionId }));
    this.events.emit({ type: 'role-permission', roleId, permissionId });
  }

  async revokePermission(roleId: number, permissionId: number): Promise<void> {
    await this.rolePermissions.delete({ roleId, permissionId });
    this.events.emit({ type: 'role-permission', roleId, permissionId });
  }
}
