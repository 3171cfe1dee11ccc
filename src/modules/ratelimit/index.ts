export * from './models/ratelimit.types';
export * from './services/memory.limiter';
export * from './services/store.limiter';
export * from './services/factory';
