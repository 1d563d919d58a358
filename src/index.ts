export * from './errors/index.js';
export * from './types/token.types.js';
export * from './types/query.types.js';
export * from './types/scaler.types.js';
export * from './config/scaler-metadata.js';
export * from './providers/auth.provider.interface.js';
export * from './providers/auth-provider.factory.js';
export * from './providers/service-principal.provider.js';
export * from './providers/managed-identity.provider.js';
export * from './services/token-store.service.js';
export * from './services/token-manager.service.js';
export * from './services/query-executor.service.js';
export * from './services/result-validator.service.js';
export * from './services/scaler.service.js';
export { buildServer, type BuildServerOptions } from './app.js';
