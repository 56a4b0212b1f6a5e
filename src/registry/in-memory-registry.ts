/**
 * In-Memory Model Registry
 *
 * Reference implementation of the registry collaborator. Stores declared
 * schemas and predict factories per model name and version; used by the
 * start script and the test suites.
 */

import type { Logger } from 'pino';
import { ModelNotFoundError, ValidationError, zodErrorToValidationError } from '../api/errors.js';
import type { LoadedModel, ModelRegistry } from '../types/model-registry.js';
import type { DeclaredSchema, PredictFn, VersionId } from '../types/models.js';
import { ModelSchemaInputSchema, NonEmptyString, type ModelSchemaInput } from '../types/schemas/index.js';

/**
 * Model code that initialises on load (weights, sessions, ...)
 */
export type VersionLoader = () => Promise<Omit<LoadedModel, 'schema'>>;

export type VersionRegistration =
  | { schema: ModelSchemaInput; predict: PredictFn }
  | { schema: ModelSchemaInput; loader: VersionLoader };

interface StoredVersion {
  schema: DeclaredSchema;
  loader: VersionLoader;
  registeredAt: number;
}

export class InMemoryModelRegistry implements ModelRegistry {
  private readonly models = new Map<string, Map<VersionId, StoredVersion>>();
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Register a model version with its declared schema.
   *
   * The schema is checked for shape only; whether its field types can be
   * served is decided when an endpoint is built against it.
   *
   * @throws {ValidationError} for a malformed schema, empty names or a duplicate version
   */
  public register(modelName: string, versionId: VersionId, registration: VersionRegistration): DeclaredSchema {
    for (const [field, value] of [
      ['modelName', modelName],
      ['versionId', versionId],
    ] as const) {
      const result = NonEmptyString.safeParse(value);
      if (!result.success) {
        throw new ValidationError(`Validation error on field '${field}': Cannot be empty`, [
          { path: field, message: 'Cannot be empty' },
        ]);
      }
    }

    const parsed = ModelSchemaInputSchema.safeParse(registration.schema);
    if (!parsed.success) {
      throw zodErrorToValidationError(parsed.error);
    }

    const versions = this.models.get(modelName) ?? new Map<VersionId, StoredVersion>();
    if (versions.has(versionId)) {
      throw new ValidationError(`Model '${modelName}' already has a version '${versionId}'`, [
        { path: 'versionId', message: 'Version already registered' },
      ]);
    }

    const loader: VersionLoader =
      'loader' in registration ? registration.loader : async () => ({ predict: registration.predict });

    versions.set(versionId, { schema: parsed.data, loader, registeredAt: Date.now() });
    this.models.set(modelName, versions);

    this.logger?.info({ modelName, versionId }, 'Model version registered');
    return parsed.data;
  }

  /**
   * Registered version ids in registration order
   */
  public listVersions(modelName: string): VersionId[] {
    return Array.from(this.models.get(modelName)?.keys() ?? []);
  }

  public async getSchema(modelName: string, versionId: VersionId): Promise<DeclaredSchema> {
    return this.lookup(modelName, versionId).schema;
  }

  public async load(modelName: string, versionId: VersionId): Promise<LoadedModel> {
    const stored = this.lookup(modelName, versionId);
    const loaded = await stored.loader();

    this.logger?.debug({ modelName, versionId }, 'Model version loaded from registry');
    return { ...loaded, schema: stored.schema };
  }

  private lookup(modelName: string, versionId: VersionId): StoredVersion {
    const stored = this.models.get(modelName)?.get(versionId);
    if (!stored) {
      throw new ModelNotFoundError(modelName, versionId);
    }
    return stored;
  }
}
