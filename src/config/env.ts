/**
 * Environment Configuration
 *
 * Parsed once at import. dotenv is loaded by the entry points
 * (server.ts, scripts/) before this module is imported.
 */

import { z } from 'zod';
import {
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
} from '../modules/risk-snapshot/contracts/engine.config.js';

const csv = (value: string | undefined): string[] | undefined =>
  value === undefined || value.trim() === ''
    ? undefined
    : value.split(',').map(s => s.trim()).filter(Boolean);

const blankAsUnset = (v: unknown) => (v === '' ? undefined : v);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform(v => v === 'true' || v === '1');

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  MONGO_URL: z.preprocess(blankAsUnset, z.string().optional()),
  OUTPUT_DIR: z.string().default('data'),

  MARKET_DATA_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
  MARKET_DATA_TOKEN: z.preprocess(blankAsUnset, z.string().optional()),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  SNAPSHOT_CRON: z.string().default('0 6 * * 1-5;0 12 * * 1-5;15 16 * * 1-5'),
  SNAPSHOT_TZ: z.string().default('America/New_York'),
  SNAPSHOT_CRON_ENABLED: flag,

  FILL_POLICY: z.preprocess(blankAsUnset, z.enum(['forward-fill', 'none']).optional()),
  CROWDING_THRESHOLD_PP: z.coerce.number().default(DEFAULT_ENGINE_CONFIG.crowdingThresholdPp),
  NEAR_TERM_MAX_DTE: z.coerce.number().int().nonnegative().default(DEFAULT_ENGINE_CONFIG.expirationWindowDays.max),
  ACTIVE_METRICS: z.string().optional(),
  OPTIONAL_METRICS: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`[Config] Invalid environment: ${detail}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();

/**
 * Engine configuration with environment overrides applied to the defaults.
 */
export function buildEngineConfig(e: Env = env): EngineConfig {
  return {
    ...DEFAULT_ENGINE_CONFIG,
    activeMetrics: csv(e.ACTIVE_METRICS) ?? DEFAULT_ENGINE_CONFIG.activeMetrics,
    optionalMetrics: csv(e.OPTIONAL_METRICS) ?? DEFAULT_ENGINE_CONFIG.optionalMetrics,
    fillPolicy: e.FILL_POLICY,
    crowdingThresholdPp: e.CROWDING_THRESHOLD_PP,
    expirationWindowDays: { ...DEFAULT_ENGINE_CONFIG.expirationWindowDays, max: e.NEAR_TERM_MAX_DTE },
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
  };
}
