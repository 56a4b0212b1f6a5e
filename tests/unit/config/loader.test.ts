import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  getConfig,
  getVersionCacheConfig,
  initializeConfig,
  loadConfig,
  resetConfig,
  validateConfig,
} from '../../../src/config/loader.js';

const baseConfig = {
  server: {
    host: '127.0.0.1',
    port: 8080,
    route: '/serve',
    version_header: 'X-Model-Version',
    cors_origin: '*',
  },
  endpoint: {
    model_name: 'translator',
    default_version: 1,
  },
  version_cache: {
    capacity: 2,
    load_timeout_ms: 60000,
    warmup_default: false,
  },
  logging: {
    level: 'info',
  },
};

describe('Config Loader', () => {
  let testConfigDir: string;
  let testConfigPath: string;

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'mux-serving-config-'));
    testConfigPath = join(testConfigDir, 'runtime.yaml');
    resetConfig();
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
    resetConfig();
  });

  describe('loadConfig', () => {
    it('loads the bundled runtime.yaml with test overrides', () => {
      const config = validateConfig(loadConfig(undefined, 'test'));

      expect(config.server.port).toBe(0);
      expect(config.server.route).toBe('/serve');
      expect(config.endpoint).toEqual({ model_name: 'translator', default_version: '1' });
      expect(config.version_cache).toEqual({ capacity: 2, load_timeout_ms: 5000, warmup_default: false });
      expect(config.logging.level).toBe('silent');
    });

    it('deep-merges the selected environment and drops the environments section', () => {
      writeFileSync(
        testConfigPath,
        yaml.dump({
          ...baseConfig,
          environments: {
            production: { server: { host: '0.0.0.0' }, version_cache: { warmup_default: true } },
          },
        })
      );

      const raw = loadConfig(testConfigPath, 'production');

      expect(raw).not.toHaveProperty('environments');
      expect(raw.server).toEqual({ ...baseConfig.server, host: '0.0.0.0' });
      expect(raw.version_cache).toEqual({ ...baseConfig.version_cache, warmup_default: true });
    });

    it('uses the base values when the environment has no overrides', () => {
      writeFileSync(testConfigPath, yaml.dump(baseConfig));

      expect(loadConfig(testConfigPath, 'development')).toEqual(baseConfig);
    });

    it('reports a missing file', () => {
      expect(() => loadConfig(join(testConfigDir, 'missing.yaml'))).toThrow(/Configuration file not found/);
    });

    it('reports invalid YAML', () => {
      writeFileSync(testConfigPath, 'server: [unclosed');

      expect(() => loadConfig(testConfigPath)).toThrow(/Failed to load configuration/);
    });

    it('rejects a document that is not a mapping', () => {
      writeFileSync(testConfigPath, '- just\n- a list\n');

      expect(() => loadConfig(testConfigPath)).toThrow(/does not contain a mapping/);
    });
  });

  describe('validateConfig', () => {
    it('normalises the version header and default version', () => {
      const config = validateConfig(baseConfig);

      expect(config.server.version_header).toBe('x-model-version');
      expect(config.endpoint.default_version).toBe('1');
    });

    it('lists each invalid field', () => {
      expect(() =>
        validateConfig({ ...baseConfig, version_cache: { ...baseConfig.version_cache, capacity: 0 } })
      ).toThrow('Configuration validation failed:\nversion_cache.capacity Must be a positive integer');
    });

    it('rejects an unknown log level', () => {
      expect(() => validateConfig({ ...baseConfig, logging: { level: 'verbose' } })).toThrow(
        'logging.level Log level must be one of: trace, debug, info, warn, error, fatal, silent'
      );
    });

    it('rejects a route that is not an absolute path', () => {
      expect(() => validateConfig({ ...baseConfig, server: { ...baseConfig.server, route: 'serve' } })).toThrow(
        'server.route must be an absolute path'
      );
    });
  });

  describe('global configuration', () => {
    it('initializes once and returns the same instance', () => {
      writeFileSync(testConfigPath, yaml.dump(baseConfig));

      const config = initializeConfig(testConfigPath, 'development');

      expect(getConfig()).toBe(config);
    });

    it('converts the version cache section', () => {
      writeFileSync(testConfigPath, yaml.dump(baseConfig));
      initializeConfig(testConfigPath, 'development');

      expect(getVersionCacheConfig()).toEqual({ capacity: 2, loadTimeoutMs: 60000 });
    });
  });
});
