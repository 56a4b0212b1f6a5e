/**
 * Version Cache
 *
 * Bounded, on-demand store of loaded model versions for one endpoint.
 *
 * Architecture:
 * - Map<versionId, CacheEntry> kept in access order (least recent first)
 * - Map<versionId, InflightLoad> for single-flight loading
 * - Every loaded schema is checked against the endpoint's pinned reference
 *   schema before it may enter the cache
 *
 * Invariants:
 * - At most one registry load per version id is in flight; every concurrent
 *   caller for that id observes the same outcome
 * - Loads of different ids never wait on each other
 * - A failed, rejected or timed-out load leaves no entry behind
 * - size <= capacity whenever `get` returns; eviction and insertion happen in
 *   one synchronous step after the victim's release hook settles or runs out
 *   of the load deadline
 *
 * @module core/version-cache
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { VersionCacheEvents } from '../api/events.js';
import {
  CancelledError,
  LoadFailure,
  ModelNotFoundError,
  SignatureMismatchError,
  isServingError,
  type ServingError,
} from '../api/errors.js';
import { VERSION_CACHE } from '../config/defaults.js';
import type {
  CacheEntry,
  GetVersionOptions,
  VersionCacheConfig,
  VersionCacheStats,
} from '../types/cache.js';
import type { LoadedModel, ModelRegistry } from '../types/model-registry.js';
import type { ModelSchema, VersionHandle, VersionId } from '../types/models.js';
import { ModelSchemaInputSchema } from '../types/schemas/model.js';
import { withTimeout, TimeoutExceededError } from '../utils/timeout.js';
import { describeSchema, isCompatible } from './schema-compat.js';
import { normalizeSchema } from './schema-translator.js';

export interface VersionCacheOptions {
  /** Registered model whose versions this cache holds */
  modelName: string;
  registry: ModelRegistry;
  /** Pinned schema every served version must match */
  referenceSchema: ModelSchema;
  config?: Partial<VersionCacheConfig>;
  logger?: Logger;
}

interface InflightLoad {
  promise: Promise<VersionHandle>;
  startedAt: number;
}

/**
 * Multiplexes model versions behind one endpoint.
 */
export class VersionCache extends EventEmitter<VersionCacheEvents> {
  private readonly modelName: string;
  private readonly registry: ModelRegistry;
  private readonly referenceSchema: ModelSchema;
  private readonly referenceDescription: string;
  private readonly maxEntries: number;
  private readonly loadTimeoutMs: number;
  private readonly logger?: Logger;

  // Access order: first key is the least recently used
  private readonly entries = new Map<VersionId, CacheEntry>();
  private readonly inflight = new Map<VersionId, InflightLoad>();
  private closed = false;

  private stats = {
    hits: 0,
    misses: 0,
    loads: 0,
    evictions: 0,
    rejections: 0,
    failures: 0,
  };

  constructor(options: VersionCacheOptions) {
    super();

    const capacity = options.config?.capacity ?? VERSION_CACHE.DEFAULT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Version cache capacity must be a positive integer, got ${capacity}`);
    }

    this.modelName = options.modelName;
    this.registry = options.registry;
    this.referenceSchema = options.referenceSchema;
    this.referenceDescription = describeSchema(options.referenceSchema);
    this.maxEntries = capacity;
    this.loadTimeoutMs = options.config?.loadTimeoutMs ?? VERSION_CACHE.DEFAULT_LOAD_TIMEOUT_MS;
    this.logger = options.logger;

    this.logger?.debug(
      {
        modelName: this.modelName,
        capacity: this.maxEntries,
        loadTimeoutMs: this.loadTimeoutMs,
        schema: this.referenceDescription,
      },
      'VersionCache initialized'
    );
  }

  public get capacity(): number {
    return this.maxEntries;
  }

  public get size(): number {
    return this.entries.size;
  }

  /**
   * Get a validated handle for a version, loading it on first use.
   *
   * @throws {ModelNotFoundError} the registry has no such version
   * @throws {SignatureMismatchError} the version's schema differs from the pinned one
   * @throws {LoadFailure} the registry or model failed, or the load timed out
   * @throws {CancelledError} `options.signal` aborted before the handle was ready
   */
  public async get(versionId: VersionId, options: GetVersionOptions = {}): Promise<VersionHandle> {
    if (this.closed) {
      throw new LoadFailure(versionId, 'Version cache is closed');
    }
    if (options.signal?.aborted) {
      throw new CancelledError(versionId, options.signal.reason);
    }

    const entry = this.entries.get(versionId);
    if (entry) {
      this.touch(entry);
      this.stats.hits++;
      this.emit('version:hit', { versionId, timestamp: entry.lastAccess });
      return entry.handle;
    }

    this.stats.misses++;

    let flight = this.inflight.get(versionId);
    if (flight) {
      this.logger?.debug({ versionId }, 'Joining in-flight version load');
    } else {
      flight = this.startLoad(versionId);
    }

    return this.waitFor(versionId, flight.promise, options.signal);
  }

  /**
   * Look up a cached handle without touching recency or stats.
   */
  public peek(versionId: VersionId): VersionHandle | undefined {
    return this.entries.get(versionId)?.handle;
  }

  public has(versionId: VersionId): boolean {
    return this.entries.has(versionId);
  }

  public isLoading(versionId: VersionId): boolean {
    return this.inflight.has(versionId);
  }

  /**
   * Cached version ids, least recently used first.
   */
  public keys(): VersionId[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Drop one version from the cache and release it.
   *
   * @returns false when the version was not cached
   */
  public async evict(versionId: VersionId): Promise<boolean> {
    const entry = this.entries.get(versionId);
    if (!entry) {
      return false;
    }

    this.entries.delete(versionId);
    this.stats.evictions++;
    this.emit('version:evicted', { versionId, reason: 'manual', timestamp: Date.now() });
    await this.releaseHandle(entry.handle);
    return true;
  }

  /**
   * Release every cached version. Later calls to `get` fail; loads still in
   * flight are released when they finish instead of being cached.
   */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const entries = Array.from(this.entries.values());
    this.entries.clear();

    for (const entry of entries) {
      this.emit('version:evicted', { versionId: entry.versionId, reason: 'close', timestamp: Date.now() });
      await this.releaseHandle(entry.handle);
    }

    this.logger?.info(
      { modelName: this.modelName, released: entries.length, inflightLoads: this.inflight.size },
      'VersionCache closed'
    );
  }

  public getStats(): VersionCacheStats {
    const lookups = this.stats.hits + this.stats.misses;

    return {
      capacity: this.maxEntries,
      size: this.entries.size,
      versions: Array.from(this.entries.values()).map((entry) => ({
        versionId: entry.versionId,
        lastAccess: entry.lastAccess,
        accessCount: entry.accessCount,
      })),
      inflightLoads: this.inflight.size,
      hits: this.stats.hits,
      misses: this.stats.misses,
      loads: this.stats.loads,
      evictions: this.stats.evictions,
      rejections: this.stats.rejections,
      failures: this.stats.failures,
      hitRate: lookups > 0 ? this.stats.hits / lookups : 0,
    };
  }

  private touch(entry: CacheEntry): void {
    entry.lastAccess = Date.now();
    entry.accessCount++;
    // Re-inserting moves the key to the most recent end
    this.entries.delete(entry.versionId);
    this.entries.set(entry.versionId, entry);
  }

  private startLoad(versionId: VersionId): InflightLoad {
    const startedAt = Date.now();
    this.stats.loads++;

    this.logger?.info({ modelName: this.modelName, versionId }, 'Loading version (cache miss)');

    const flight: InflightLoad = {
      startedAt,
      promise: this.performLoad(versionId, startedAt).finally(() => {
        if (this.inflight.get(versionId) === flight) {
          this.inflight.delete(versionId);
        }
      }),
    };

    this.inflight.set(versionId, flight);
    return flight;
  }

  private async performLoad(versionId: VersionId, startedAt: number): Promise<VersionHandle> {
    let loaded: LoadedModel;
    try {
      loaded = await this.loadFromRegistry(versionId);
    } catch (error) {
      const failure = this.toLoadError(versionId, error);
      this.stats.failures++;
      this.emit('version:load-failed', { versionId, code: failure.code, timestamp: Date.now() });
      this.logger?.warn(
        { versionId, code: failure.code, error: failure.message, cause: describeCause(error) },
        'Version load failed'
      );
      throw failure;
    }

    if (!isCompatible(this.referenceSchema, loaded.schema)) {
      const actual = describeSchema(loaded.schema);
      this.stats.rejections++;
      this.emit('version:rejected', {
        versionId,
        expected: this.referenceDescription,
        actual,
        timestamp: Date.now(),
      });
      this.logger?.warn(
        { versionId, expected: this.referenceDescription, actual },
        'Version rejected: signature mismatch'
      );
      await this.releaseLoaded(versionId, loaded);
      throw new SignatureMismatchError(versionId, this.referenceDescription, actual);
    }

    const handle: VersionHandle = Object.freeze({
      versionId,
      schema: normalizeSchema(loaded.schema),
      predict: loaded.predict,
      release: loaded.release,
    });

    await this.admit(handle);

    const durationMs = Date.now() - startedAt;
    this.emit('version:loaded', { versionId, durationMs, timestamp: Date.now() });
    this.logger?.info(
      { versionId, durationMs, cached: this.keys() },
      'Version loaded'
    );

    return handle;
  }

  private async loadFromRegistry(versionId: VersionId): Promise<LoadedModel> {
    // A synchronous throw from the registry becomes a rejection
    const loading = Promise.resolve().then(() => this.registry.load(this.modelName, versionId));

    let loaded: LoadedModel;
    try {
      loaded = await withTimeout(loading, this.loadTimeoutMs, `Loading version '${versionId}'`);
    } catch (error) {
      if (error instanceof TimeoutExceededError) {
        // The registry keeps going; whatever it produces is not cached
        void loading.then(
          (late) => this.releaseLoaded(versionId, late),
          (lateError: unknown) =>
            this.logger?.debug(
              { versionId, error: describeCause(lateError) },
              'Timed-out version load finished with an error'
            )
        );
      }
      throw error;
    }

    const declared = ModelSchemaInputSchema.safeParse(loaded.schema);
    if (!declared.success) {
      await this.releaseLoaded(versionId, loaded);
      throw new LoadFailure(versionId, `Version '${versionId}' reported a malformed schema`, declared.error);
    }

    return { ...loaded, schema: declared.data };
  }

  /**
   * Insert a freshly loaded handle, evicting least recently used entries first.
   */
  private async admit(handle: VersionHandle): Promise<void> {
    for (;;) {
      if (this.closed) {
        await this.releaseHandle(handle);
        throw new LoadFailure(handle.versionId, 'Version cache closed while loading');
      }

      if (this.entries.size < this.maxEntries) {
        const now = Date.now();
        this.entries.set(handle.versionId, {
          versionId: handle.versionId,
          handle,
          loadedAt: now,
          lastAccess: now,
          accessCount: 1,
        });
        return;
      }

      const oldest = this.entries.values().next();
      if (oldest.done) {
        continue;
      }
      const victim = oldest.value;

      this.entries.delete(victim.versionId);
      this.stats.evictions++;
      this.emit('version:evicted', { versionId: victim.versionId, reason: 'lru', timestamp: Date.now() });
      this.logger?.info(
        { versionId: victim.versionId, lastAccess: victim.lastAccess, incoming: handle.versionId },
        'Evicting LRU version from cache'
      );

      await this.releaseHandle(victim.handle);
    }
  }

  private waitFor(
    versionId: VersionId,
    promise: Promise<VersionHandle>,
    signal: AbortSignal | undefined
  ): Promise<VersionHandle> {
    if (!signal) {
      return promise;
    }

    return new Promise<VersionHandle>((resolve, reject) => {
      const onAbort = (): void => {
        this.logger?.debug({ versionId }, 'Waiter cancelled; load continues for others');
        reject(new CancelledError(versionId, signal.reason));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      promise.then(
        (handle) => {
          signal.removeEventListener('abort', onAbort);
          resolve(handle);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private toLoadError(versionId: VersionId, error: unknown): ServingError {
    if (error instanceof ModelNotFoundError || error instanceof LoadFailure) {
      return error;
    }
    if (error instanceof TimeoutExceededError) {
      return new LoadFailure(versionId, error.message, error);
    }
    if (isServingError(error)) {
      return new LoadFailure(versionId, `Failed to load version '${versionId}': ${error.message}`, error);
    }
    return new LoadFailure(versionId, `Failed to load version '${versionId}'`, error);
  }

  private async releaseLoaded(versionId: VersionId, loaded: LoadedModel): Promise<void> {
    if (!loaded.release) {
      return;
    }
    try {
      await loaded.release();
    } catch (error) {
      this.logger?.warn({ versionId, error: describeCause(error) }, 'Failed to release discarded version');
    }
  }

  /**
   * Run a handle's release hook under the load deadline. A hook that fails or
   * never settles is logged and abandoned, so a pending load is never held up
   * by the version it evicts.
   */
  private async releaseHandle(handle: VersionHandle): Promise<void> {
    if (!handle.release) {
      return;
    }
    const { release, versionId } = handle;
    // A synchronous throw from the hook becomes a rejection
    const releasing = Promise.resolve().then(() => release());

    try {
      await withTimeout(releasing, this.loadTimeoutMs, `Releasing version '${versionId}'`);
    } catch (error) {
      // Eviction still completes; the entry is already gone
      this.logger?.warn({ versionId, error: describeCause(error) }, 'Failed to release version');
      if (error instanceof TimeoutExceededError) {
        void releasing.catch((lateError: unknown) =>
          this.logger?.debug({ versionId, error: describeCause(lateError) }, 'Abandoned release finished with an error')
        );
      }
    }
  }
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
