/**
 * Test helpers for version cache and endpoint tests
 *
 * `FakeRegistry` implements the registry collaborator with per-version knobs:
 * a gate that holds the load open, a failure to throw, and a record of every
 * load and release call.
 */

import { ModelNotFoundError } from '../../src/api/errors.js';
import type { LoadedModel, ModelRegistry } from '../../src/types/model-registry.js';
import type { DeclaredField, DeclaredSchema, PredictFn, VersionId } from '../../src/types/models.js';

export function field(name: string, type: string, required = true): DeclaredField {
  return { name, type, required };
}

export const translatorSchema: DeclaredSchema = {
  inputs: [field('prompt', 'string')],
  outputs: [field('translation_text', 'string')],
};

export const renamedInputSchema: DeclaredSchema = {
  inputs: [field('text_to_translate', 'string')],
  outputs: [field('translation_text', 'string')],
};

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Predict function that prefixes the prompt with the version id
 */
export function echoPredict(versionId: VersionId): PredictFn {
  return async (batch) => batch.map((row) => ({ translation_text: `v${versionId}:${String(row.prompt)}` }));
}

export interface FakeVersion {
  schema: DeclaredSchema;
  predict?: PredictFn;
  /** Load waits for this before returning */
  gate?: Promise<void>;
  /** Load rejects with this */
  failWith?: Error;
}

export class FakeRegistry implements ModelRegistry {
  public readonly loadCalls: VersionId[] = [];
  public readonly released: VersionId[] = [];
  private readonly versions = new Map<VersionId, FakeVersion>();

  public define(versionId: VersionId, version: FakeVersion): this {
    this.versions.set(versionId, version);
    return this;
  }

  public loadCount(versionId: VersionId): number {
    return this.loadCalls.filter((id) => id === versionId).length;
  }

  public async getSchema(modelName: string, versionId: VersionId): Promise<DeclaredSchema> {
    return this.lookup(modelName, versionId).schema;
  }

  public async load(modelName: string, versionId: VersionId): Promise<LoadedModel> {
    this.loadCalls.push(versionId);
    const version = this.lookup(modelName, versionId);

    if (version.gate) {
      await version.gate;
    }
    if (version.failWith) {
      throw version.failWith;
    }

    return {
      schema: version.schema,
      predict: version.predict ?? echoPredict(versionId),
      release: () => {
        this.released.push(versionId);
      },
    };
  }

  private lookup(modelName: string, versionId: VersionId): FakeVersion {
    const version = this.versions.get(versionId);
    if (!version) {
      throw new ModelNotFoundError(modelName, versionId);
    }
    return version;
  }
}

/**
 * Registry holding versions 1, 3 and 4 with the translator schema and
 * version 2 with a renamed input.
 */
export function createTranslatorRegistry(): FakeRegistry {
  return new FakeRegistry()
    .define('1', { schema: translatorSchema })
    .define('2', { schema: renamedInputSchema })
    .define('3', { schema: translatorSchema })
    .define('4', { schema: translatorSchema });
}
