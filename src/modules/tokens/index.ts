export * from './models/token.types';
export * from './services/token.services';
