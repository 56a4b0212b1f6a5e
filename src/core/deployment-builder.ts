/**
 * Deployment Builder
 *
 * Builds one serving endpoint for a model name and default version. The
 * default version's schema is fetched once and pinned: the endpoint's external
 * shape is fixed here and never follows versions registered later.
 */

import type { Logger } from 'pino';
import { InvalidSchemaError, zodErrorToValidationError } from '../api/errors.js';
import { VERSION_CACHE } from '../config/defaults.js';
import type { EndpointDescriptor, EndpointOptions } from '../types/endpoint.js';
import type { ModelRegistry } from '../types/model-registry.js';
import { EndpointOptionsSchema, ModelSchemaInputSchema } from '../types/schemas/model.js';
import { describeSchema } from './schema-compat.js';
import { translateSchema } from './schema-translator.js';
import { VersionCache } from './version-cache.js';

/**
 * Build an endpoint descriptor.
 *
 * Only the registry's schema is read; no predict function is loaded until the
 * first request (or an explicit `warmupDefault`).
 *
 * @throws {ValidationError} when model name or default version is missing
 * @throws {ModelNotFoundError} when the default version does not exist
 * @throws {UnsupportedTypeError | InvalidSchemaError} when the schema is malformed or cannot back a contract
 */
export async function buildEndpoint(
  registry: ModelRegistry,
  options: EndpointOptions,
  logger?: Logger
): Promise<EndpointDescriptor> {
  const parsed = EndpointOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw zodErrorToValidationError(parsed.error);
  }
  const { modelName, defaultVersion } = parsed.data;

  const declared = ModelSchemaInputSchema.safeParse(await registry.getSchema(modelName, defaultVersion));
  if (!declared.success) {
    throw new InvalidSchemaError(`Version '${defaultVersion}' of model '${modelName}' declares a malformed schema`, {
      modelName,
      versionId: defaultVersion,
      issues: declared.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  const contract = translateSchema(declared.data);

  const cache = new VersionCache({
    modelName,
    registry,
    referenceSchema: contract.schema,
    config: {
      capacity: parsed.data.capacity ?? VERSION_CACHE.DEFAULT_CAPACITY,
      loadTimeoutMs: parsed.data.loadTimeoutMs ?? VERSION_CACHE.DEFAULT_LOAD_TIMEOUT_MS,
    },
    logger: logger?.child({ modelName }),
  });

  logger?.info(
    {
      modelName,
      defaultVersion,
      signature: describeSchema(contract.schema),
      capacity: cache.capacity,
    },
    'Endpoint built'
  );

  return Object.freeze({
    modelName,
    defaultVersion,
    referenceSchema: contract.schema,
    contract,
    cache,
  });
}

/**
 * Load the default version ahead of the first request.
 *
 * Failures are logged and returned rather than thrown; the endpoint still
 * serves and will retry the load on demand.
 */
export async function warmupDefault(
  endpoint: EndpointDescriptor,
  logger?: Logger
): Promise<{ success: boolean; durationMs: number; error?: unknown }> {
  const startTime = Date.now();

  try {
    await endpoint.cache.get(endpoint.defaultVersion);
    const durationMs = Date.now() - startTime;
    logger?.info(
      { modelName: endpoint.modelName, version: endpoint.defaultVersion, durationMs },
      'Default version warmed up'
    );
    return { success: true, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    logger?.warn(
      { modelName: endpoint.modelName, version: endpoint.defaultVersion, error },
      'Failed to warm up default version'
    );
    return { success: false, durationMs, error };
  }
}
