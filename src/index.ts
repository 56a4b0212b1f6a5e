export { buildEndpoint, warmupDefault } from './core/deployment-builder.js';
export { RequestRouter, resolveVersion } from './core/request-router.js';
export type { HandleOptions, RequestPhase, RouteResult } from './core/request-router.js';
export { VersionCache, type VersionCacheOptions } from './core/version-cache.js';
export { translateSchema, normalizeSchema, isFieldType } from './core/schema-translator.js';
export type { Contract, ContractDescription, WireRecord } from './core/schema-translator.js';
export { isCompatible, diffSchemas, describeSchema, type SchemaDiff } from './core/schema-compat.js';

export {
  ServingError,
  UnsupportedTypeError,
  InvalidSchemaError,
  ModelNotFoundError,
  SignatureMismatchError,
  LoadFailure,
  ValidationError,
  PredictionError,
  CancelledError,
  isServingError,
  zodErrorToValidationError,
  toRoutingError,
} from './api/errors.js';
export type { ServingErrorCode, RoutingError } from './api/errors.js';
export type * from './api/events.js';

export { InMemoryModelRegistry } from './registry/in-memory-registry.js';
export type { VersionLoader, VersionRegistration } from './registry/in-memory-registry.js';
export { ApiServer, type ApiServerOptions } from './server/api-server.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  getVersionCacheConfig,
} from './config/loader.js';
export type { Environment, RawConfig, RuntimeConfig } from './config/loader.js';
export { VERSION_CACHE, SERVER } from './config/defaults.js';

export { initializeLogger, createLogger, lazyLog, type Logger } from './utils/logger.js';
export { withTimeout, TimeoutExceededError } from './utils/timeout.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
