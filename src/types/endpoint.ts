/**
 * Endpoint Types
 */

import type { Contract } from '../core/schema-translator.js';
import type { VersionCache } from '../core/version-cache.js';
import type { ModelSchema, VersionId } from './models.js';

/**
 * Input to the deployment builder
 */
export interface EndpointOptions {
  modelName: string;
  defaultVersion: VersionId;
  /** Version cache capacity (default: 2) */
  capacity?: number;
  /** Per-load timeout in milliseconds (default: 60000) */
  loadTimeoutMs?: number;
}

/**
 * Immutable description of one serving endpoint.
 *
 * The reference schema and contract are pinned at build time and never change
 * for the lifetime of the endpoint.
 */
export interface EndpointDescriptor {
  readonly modelName: string;
  readonly defaultVersion: VersionId;
  readonly referenceSchema: ModelSchema;
  readonly contract: Contract;
  readonly cache: VersionCache;
}

/**
 * Successful router result
 */
export interface ServeResponse {
  model: string;
  version: VersionId;
  predictions: Array<Record<string, unknown>>;
}
