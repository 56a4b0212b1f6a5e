/**
 * Version Cache Event System
 *
 * Defines event types and payloads emitted by `VersionCache`.
 */

import type { ServingErrorCode } from './errors.js';

/**
 * Event payload when a version finishes loading and enters the cache
 */
export interface VersionLoadedEvent {
  versionId: string;
  durationMs: number;
  timestamp: number;
}

/**
 * Event payload for a cache hit
 */
export interface VersionHitEvent {
  versionId: string;
  timestamp: number;
}

/**
 * Event payload when a version leaves the cache
 */
export interface VersionEvictedEvent {
  versionId: string;
  reason: 'lru' | 'manual' | 'close';
  timestamp: number;
}

/**
 * Event payload when a loaded version is refused for its schema
 */
export interface VersionRejectedEvent {
  versionId: string;
  expected: string;
  actual: string;
  timestamp: number;
}

/**
 * Event payload when a load fails for any other reason
 */
export interface VersionLoadFailedEvent {
  versionId: string;
  code: ServingErrorCode;
  timestamp: number;
}

/**
 * Map of all version cache events
 */
export interface VersionCacheEvents {
  'version:loaded': (event: VersionLoadedEvent) => void;
  'version:hit': (event: VersionHitEvent) => void;
  'version:evicted': (event: VersionEvictedEvent) => void;
  'version:rejected': (event: VersionRejectedEvent) => void;
  'version:load-failed': (event: VersionLoadFailedEvent) => void;
}

export type VersionCacheEventName = keyof VersionCacheEvents;
