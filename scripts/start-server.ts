/**
 * Server Startup Script
 *
 * Launches one serving endpoint over a demo in-memory registry. The registry
 * holds three versions of the configured model: versions 1 and 3 share a
 * signature, version 2 renames its input and is refused at load time.
 */

import { ApiServer } from '../src/server/api-server.js';
import { buildEndpoint, warmupDefault } from '../src/core/deployment-builder.js';
import { InMemoryModelRegistry } from '../src/registry/in-memory-registry.js';
import { initializeConfig, getVersionCacheConfig } from '../src/config/loader.js';
import { initializeLogger } from '../src/utils/logger.js';
import type { FieldRecord } from '../src/types/models.js';

const translatorSchema = {
  inputs: [{ name: 'prompt', type: 'string' }],
  outputs: [{ name: 'translation_text', type: 'string' }],
};

function echoTranslator(prefix: string) {
  return async (batch: FieldRecord[]) =>
    batch.map((row) => ({ translation_text: `${prefix}${String(row.prompt)}` }));
}

function createDemoRegistry(modelName: string, registry: InMemoryModelRegistry): InMemoryModelRegistry {
  registry.register(modelName, '1', { schema: translatorSchema, predict: echoTranslator('[v1] ') });
  registry.register(modelName, '2', {
    schema: {
      inputs: [{ name: 'text_to_translate', type: 'string' }],
      outputs: [{ name: 'translation_text', type: 'string' }],
    },
    predict: echoTranslator('[v2] '),
  });
  registry.register(modelName, '3', { schema: translatorSchema, predict: echoTranslator('[v3] ') });
  return registry;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = initializeConfig(process.env.MUX_SERVING_CONFIG);
  const logger = initializeLogger(config.logging.level);

  logger.info('Server starting...');

  const modelName = config.endpoint.model_name;
  const registry = createDemoRegistry(modelName, new InMemoryModelRegistry(logger.child({ component: 'Registry' })));
  const cacheConfig = getVersionCacheConfig(config);

  const endpoint = await buildEndpoint(
    registry,
    {
      modelName,
      defaultVersion: config.endpoint.default_version,
      capacity: cacheConfig.capacity,
      loadTimeoutMs: cacheConfig.loadTimeoutMs,
    },
    logger.child({ component: 'DeploymentBuilder' })
  );

  if (config.version_cache.warmup_default) {
    await warmupDefault(endpoint, logger.child({ component: 'Warmup' }));
  }

  const server = new ApiServer(endpoint, {
    host: config.server.host,
    port: config.server.port,
    route: config.server.route,
    versionHeader: config.server.version_header,
    corsOrigin: config.server.cors_origin,
    logger: logger.child({ component: 'ApiServer' }),
  });

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Already shutting down, please wait...');
      return;
    }

    isShuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully');

    try {
      await server.stop();
      logger.info('Server stopped successfully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  const port = await server.start();
  const displayAddress = config.server.host === '0.0.0.0' ? 'localhost' : config.server.host;

  logger.info(
    {
      serve: `POST http://${displayAddress}:${port}${config.server.route}`,
      contract: `GET http://${displayAddress}:${port}${config.server.route}/contract`,
      versions: `GET http://${displayAddress}:${port}${config.server.route}/versions`,
      versionHeader: config.server.version_header,
      registered: registry.listVersions(modelName),
    },
    'Server is READY'
  );
}

main().catch((error: unknown) => {
  // The configured logger may not exist yet
  initializeLogger().fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
