export * from './models/access.entity';
export * from './models/access.types';
export * from './data/access.repository';
