import { Column, Entity, Index, PrimaryColumn, Unique } from 'typeorm';

import { Model } from '@/common/models/Model';

/**
 * An identity that can authenticate. The password hash is never selected
 * unless asked for.
 */
@Entity({ name: 'principal' })
@Unique(['handle'])
export class Principal extends Model {
  @Column({ type: 'varchar', length: 100 })
  handle!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash', select: false })
  passwordHash!: string;

  @Column({ type: 'boolean', default: true })
  active: boolean = true;
}

@Entity({ name: 'role' })
@Unique(['name'])
export class Role extends Model {
  @Column({ type: 'varchar', length: 100 })
  name!: string;
}

@Entity({ name: 'permission' })
@Unique(['name'])
export class Permission extends Model {
  // e.g. "users:write"
  @Column({ type: 'varchar', length: 150 })
  name!: string;
}

// Association tables stay flat: no relation graph to walk or cycle through

@Entity({ name: 'user_role' })
export class UserRole {
  @PrimaryColumn({ type: 'int', name: 'principal_id' })
  principalId!: number;

  @PrimaryColumn({ type: 'int', name: 'role_id' })
  @Index()
  roleId!: number;
}

@Entity({ name: 'role_permission' })
export class RolePermission {
  @PrimaryColumn({ type: 'int', name: 'role_id' })
  roleId!: number;

  @PrimaryColumn({ type: 'int', name: 'permission_id' })
  permissionId!: number;
}
