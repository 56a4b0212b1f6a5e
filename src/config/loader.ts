/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { VersionCacheConfig } from '../types/cache.js';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';

export type { RuntimeConfig } from '../types/schemas/config.js';

export type Environment = 'production' | 'development' | 'test';

/**
 * Configuration as read from YAML, before validation
 */
export type RawConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const output: RawConfig = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  // Start from current module directory
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  // Fallback to cwd if package.json not found
  return process.cwd();
}

function resolveEnvironment(environment?: Environment): Environment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Load configuration from YAML file
 *
 * Applies `environments.<env>` overrides and strips the `environments` section.
 * The result is not validated; see `validateConfig`.
 */
export function loadConfig(configPath?: string, environment?: Environment): RawConfig {
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'runtime.yaml');

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      throw new Error(
        `Configuration file not found: ${finalPath}. ` +
          `Please ensure config/runtime.yaml exists in the project root.`
      );
    }
    throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to load configuration: ${finalPath} does not contain a mapping`);
  }

  const { environments, ...baseConfig } = parsed;
  const env = resolveEnvironment(environment);
  const envConfig = isPlainObject(environments) ? environments[env] : undefined;

  return isPlainObject(envConfig) ? deepMerge(baseConfig, envConfig) : baseConfig;
}

/**
 * Validate configuration values
 *
 * @returns the typed configuration, with defaults and normalisation applied
 */
export function validateConfig(config: unknown): RuntimeConfig {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: RuntimeConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): RuntimeConfig {
  globalConfig = validateConfig(loadConfig(configPath, environment));
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): RuntimeConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert YAML version cache config (snake_case) to VersionCacheConfig (camelCase)
 */
export function getVersionCacheConfig(config: RuntimeConfig = getConfig()): VersionCacheConfig {
  return {
    capacity: config.version_cache.capacity,
    loadTimeoutMs: config.version_cache.load_timeout_ms,
  };
}
