/**
 * Model Registry Types
 *
 * The registry stores models, their versions and the schemas each version
 * declared at registration. The serving layer only consumes it.
 */

import type { DeclaredSchema, PredictFn, VersionId } from './models.js';

/**
 * What a registry hands back when a version is loaded.
 */
export interface LoadedModel {
  /** Schema the loaded version actually declares */
  schema: DeclaredSchema;
  /** Inference entry point */
  predict: PredictFn;
  /** Optional hook to free memory or handles when the version is dropped */
  release?: () => void | Promise<void>;
}

/**
 * Registry collaborator consumed by the deployment builder and version cache.
 *
 * Both methods reject with `ModelNotFoundError` when the name/version does not
 * exist; any other rejection is treated as a load failure.
 */
export interface ModelRegistry {
  getSchema(modelName: string, versionId: VersionId): Promise<DeclaredSchema>;
  load(modelName: string, versionId: VersionId): Promise<LoadedModel>;
}
