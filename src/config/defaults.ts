/**
 * Default Configuration Constants
 *
 * Fallbacks used when a value is neither passed in code nor set in
 * config/runtime.yaml.
 */

/**
 * Version Cache Configuration
 */
export const VERSION_CACHE = {
  /** Loaded versions kept per endpoint */
  DEFAULT_CAPACITY: 2,

  /** Per-load timeout (ms) */
  DEFAULT_LOAD_TIMEOUT_MS: 60_000, // 1 minute
} as const;

/**
 * HTTP Server Configuration
 */
export const SERVER = {
  DEFAULT_HOST: '127.0.0.1',

  DEFAULT_PORT: 8080,

  /** Serving route; contract and stats routes hang off it */
  DEFAULT_ROUTE: '/serve',

  /** Header carrying the requested version id (lower-case, as node exposes it) */
  DEFAULT_VERSION_HEADER: 'x-model-version',

  /** Maximum accepted JSON body */
  MAX_BODY_BYTES: '1mb',
} as const;
