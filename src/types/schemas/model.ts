/**
 * Model signature Zod schemas
 *
 * Validates schemas declared at registration time. Field types are accepted
 * as free strings here; the schema translator decides which are supported.
 */

import { z } from 'zod';
import { NonEmptyString } from './common.js';

/**
 * Declared field schema
 * Mirrors: src/types/models.ts:FieldSpec (type left open)
 */
export const FieldSpecInputSchema = z.object({
  name: NonEmptyString,
  type: NonEmptyString,
  required: z.boolean().default(true),
});

export type FieldSpecInput = z.input<typeof FieldSpecInputSchema>;

/**
 * Declared model schema
 * Mirrors: src/types/models.ts:ModelSchema
 */
export const ModelSchemaInputSchema = z.object({
  inputs: z.array(FieldSpecInputSchema),
  outputs: z.array(FieldSpecInputSchema),
});

export type ModelSchemaInput = z.input<typeof ModelSchemaInputSchema>;

/**
 * Endpoint build options schema
 * Mirrors: src/types/endpoint.ts:EndpointOptions
 */
export const EndpointOptionsSchema = z.object({
  modelName: NonEmptyString,
  defaultVersion: NonEmptyString,
  capacity: z.number().int('Must be an integer').positive('Capacity must be positive').optional(),
  loadTimeoutMs: z.number().int('Must be an integer').min(0, 'Must be non-negative').optional(),
});
