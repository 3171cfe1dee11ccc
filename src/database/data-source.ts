import 'reflect-metadata';
import { DataSource, type DataSourceOptions } from 'typeorm';

import type { AppConfig } from '@/config';
import {
  Permission,
  Principal,
  Role,
  RolePermission,
  UserRole,
} from '@/modules/access/models/access.entity';

export const accessEntities = [Principal, Role, Permission, UserRole, RolePermission];

export function createDataSourceOptions(
  config: Pick<
    AppConfig,
    | 'DB_TYPE'
    | 'DB_HOST'
    | 'DB_PORT'
    | 'DB_USERNAME'
    | 'DB_PASSWORD'
    | 'DB_DATABASE'
    | 'DB_SYNCHRONIZE'
    | 'DB_LOGGING'
  >,
): DataSourceOptions {
  return {
    type: config.DB_TYPE,
    host: config.DB_HOST,
    port: config.DB_PORT,
    username: config.DB_USERNAME,
    password: config.DB_PASSWORD,
    database: config.DB_DATABASE,
    synchronize: config.DB_SYNCHRONIZE,
    logging: config.DB_LOGGING ? ['query', 'error'] : ['error'],
    entities: accessEntities,
    migrations: [],
    subscribers: [],
  };
}

export function createDataSource(config: Parameters<typeof createDataSourceOptions>[0]): DataSource {
  return new DataSource(createDataSourceOptions(config));
}
