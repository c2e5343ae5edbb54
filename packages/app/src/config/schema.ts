/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { findStation, listTargets } from '@airwatch/provider-waqi';

const DATABASE_URL_PATTERN = /^(postgres(ql)?:\/\/.+|memory:)$/;

/**
 * Comma-separated target list, canonicalized to registry names and
 * de-duplicated. Empty means every known target.
 */
const targetsSchema = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const requested = value
      .split(',')
      .map((target) => target.trim())
      .filter((target) => target.length > 0);

    if (requested.length === 0) {
      return listTargets();
    }

    const targets: string[] = [];
    for (const target of requested) {
      const station = findStation(target);
      if (!station) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown target "${target}". Known targets: ${listTargets().join(', ')}`,
        });
        continue;
      }
      if (!targets.includes(station.name)) {
        targets.push(station.name);
      }
    }
    return targets;
  });

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
      name: z.string().default('airwatch'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  provider: z
    .object({
      token: z.string().optional(),
      baseUrl: z.string().url().default('https://api.waqi.info'),
      timeout: z.coerce.number().int().positive().default(10000),
    })
    .default({}),

  targets: targetsSchema,

  scheduler: z
    .object({
      // Values below 1 are raised to 1 by the scheduler
      intervalMinutes: z.coerce.number().default(10),
    })
    .default({}),

  cache: z
    .object({
      liveTtlMinutes: z.coerce.number().positive().default(10),
      forecastTtlMinutes: z.coerce.number().positive().default(120),
    })
    .default({}),

  persistence: z
    .object({
      dedupWindowMinutes: z.coerce.number().nonnegative().default(5),
    })
    .default({}),

  timeline: z
    .object({
      windowDays: z.coerce.number().int().positive().default(7),
      defaultIndex: z.coerce.number().int().nonnegative().default(75),
    })
    .default({}),

  database: z
    .object({
      url: z
        .string()
        .regex(DATABASE_URL_PATTERN, 'Expected postgres://... or memory:')
        .default('memory:'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  WAQI_API_TOKEN: 'provider.token',
  WAQI_BASE_URL: 'provider.baseUrl',
  WAQI_TIMEOUT_MS: 'provider.timeout',
  AIRWATCH_TARGETS: 'targets',
  REFRESH_INTERVAL_MINUTES: 'scheduler.intervalMinutes',
  LIVE_TTL_MINUTES: 'cache.liveTtlMinutes',
  FORECAST_TTL_MINUTES: 'cache.forecastTtlMinutes',
  DEDUP_WINDOW_MINUTES: 'persistence.dedupWindowMinutes',
  TIMELINE_WINDOW_DAYS: 'timeline.windowDays',
  TIMELINE_DEFAULT_INDEX: 'timeline.defaultIndex',
  DATABASE_URL: 'database.url',
};
