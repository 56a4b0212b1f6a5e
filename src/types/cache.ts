/**
 * Version Cache Types
 *
 * @module types/cache
 */

import type { VersionHandle, VersionId } from './models.js';

/**
 * Options accepted by `VersionCache`
 */
export interface VersionCacheConfig {
  /** Maximum number of loaded versions kept at once (default: 2) */
  capacity: number;

  /** Per-load timeout in milliseconds; 0 disables it */
  loadTimeoutMs: number;
}

/**
 * One live cache slot
 */
export interface CacheEntry {
  versionId: VersionId;
  handle: VersionHandle;
  /** ms since epoch when the load finished */
  loadedAt: number;
  /** ms since epoch of the most recent access */
  lastAccess: number;
  /** Number of gets served by this entry, including the loading one */
  accessCount: number;
}

/**
 * Per-call options for `VersionCache.get`
 */
export interface GetVersionOptions {
  /** Aborting rejects only this caller; the shared load keeps running */
  signal?: AbortSignal;
}

/**
 * Snapshot returned by `VersionCache.getStats()`
 */
export interface VersionCacheStats {
  capacity: number;
  size: number;
  /** Cached version ids, least recently used first */
  versions: Array<{
    versionId: VersionId;
    lastAccess: number;
    accessCount: number;
  }>;
  inflightLoads: number;
  hits: number;
  misses: number;
  loads: number;
  evictions: number;
  rejections: number;
  failures: number;
  hitRate: number;
}
