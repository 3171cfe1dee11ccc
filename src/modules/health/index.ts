export * from './services/health.services';
export * from './health.routes';
