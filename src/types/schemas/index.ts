/**
 * Zod schema exports for mux-serving validation
 *
 * @example
 * ```typescript
 * import { ModelSchemaInputSchema } from 'mux-serving';
 *
 * const result = ModelSchemaInputSchema.safeParse({ inputs: [], outputs: [] });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Signature schemas
export * from './model.js';

// Config schemas
export * from './config.js';
