/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { LogLevelSchema, NonEmptyString, NonNegativeInteger, PositiveInteger } from './common.js';

/**
 * HTTP Server Configuration
 */
export const ServerConfigSchema = z.object({
  host: NonEmptyString,
  port: z.number().int().min(0, 'must be >= 0').max(65535, 'must be <= 65535'),
  route: z.string().regex(/^\/[A-Za-z0-9/_-]*$/, 'must be an absolute path'),
  version_header: NonEmptyString.transform((value) => value.toLowerCase()),
  cors_origin: z.union([z.string(), z.array(z.string())]),
});

/**
 * Endpoint Configuration
 */
export const EndpointConfigSchema = z.object({
  model_name: NonEmptyString,
  default_version: z.union([NonEmptyString, z.number().transform(String)]),
});

/**
 * Version Cache Configuration
 */
export const VersionCacheConfigSchema = z.object({
  capacity: PositiveInteger,
  load_timeout_ms: NonNegativeInteger,
  warmup_default: z.boolean(),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

/**
 * Complete Runtime Configuration Schema
 */
export const RuntimeConfigSchema = z.object({
  server: ServerConfigSchema,
  endpoint: EndpointConfigSchema,
  version_cache: VersionCacheConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;
