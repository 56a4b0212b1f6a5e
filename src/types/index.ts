/**
 * Main type exports for mux-serving
 */

export * from './models.js';
export * from './model-registry.js';
export * from './cache.js';
export * from './endpoint.js';
