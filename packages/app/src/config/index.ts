/**
 * Configuration loading and management
 */

import { redactDatabaseUrl } from '@airwatch/db-simple';
import type { Logger } from '@airwatch/logger';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = Record<string, unknown>;

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment and defaults
 *
 * Values stay strings here; the schema coerces numbers.
 *
 * @throws Error listing every validation issue
 */
export function loadConfig(logger?: Logger, env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (lastKey === undefined) {
    return;
  }

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Get configuration summary for logging. Secrets are masked.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    provider: {
      baseUrl: config.provider.baseUrl,
      timeout: config.provider.timeout,
      token: config.provider.token ? '***' : 'missing',
    },
    targets: config.targets,
    intervalMinutes: config.scheduler.intervalMinutes,
    cacheTtlMinutes: {
      live: config.cache.liveTtlMinutes,
      forecast: config.cache.forecastTtlMinutes,
    },
    dedupWindowMinutes: config.persistence.dedupWindowMinutes,
    timeline: config.timeline,
    database: redactDatabaseUrl(config.database.url),
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
