import { z } from 'zod';
import { parseTable } from './tableLoader';

/**
 * Engine configuration, read from the environment with fallbacks.
 *
 * IMPACT_SCALING_POLICY   linear | effectAware (default effectAware)
 * TARGET_TIME_ZONE        IANA zone used for "same calendar day" checks (default UTC)
 * LOG_DOMAIN_CLAMPS       true to log every clamped metric input
 * TARGET_CACHE_BACKEND    memory | firestore (default memory)
 * TARGET_CACHE_COLLECTION Firestore collection for cached targets (default dailyTargets)
 * PORT                    HTTP port (default 4000)
 */

// Bump whenever a curve, interaction or search parameter changes; cached targets
// from an older version are recomputed.
export const TARGET_ALGORITHM_VERSION = 3;

export const SCALING_POLICIES = ['linear', 'effectAware'] as const;
export type ScalingPolicy = (typeof SCALING_POLICIES)[number];

const envSchema = z.object({
  IMPACT_SCALING_POLICY: z.enum(SCALING_POLICIES).default('effectAware'),
  TARGET_TIME_ZONE: z.string().min(1).default('UTC'),
  LOG_DOMAIN_CLAMPS: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  TARGET_CACHE_BACKEND: z.enum(['memory', 'firestore']).default('memory'),
  TARGET_CACHE_COLLECTION: z.string().min(1).default('dailyTargets'),
  PORT: z.coerce.number().int().positive().default(4000),
});

export interface EngineConfig {
  scalingPolicy: ScalingPolicy;
  timeZone: string;
  logDomainClamps: boolean;
  targetCacheBackend: 'memory' | 'firestore';
  targetCacheCollection: string;
  port: number;
  algorithmVersion: number;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const values = parseTable(envSchema, {
    IMPACT_SCALING_POLICY: env.IMPACT_SCALING_POLICY || undefined,
    TARGET_TIME_ZONE: env.TARGET_TIME_ZONE || undefined,
    LOG_DOMAIN_CLAMPS: env.LOG_DOMAIN_CLAMPS || undefined,
    TARGET_CACHE_BACKEND: env.TARGET_CACHE_BACKEND || undefined,
    TARGET_CACHE_COLLECTION: env.TARGET_CACHE_COLLECTION || undefined,
    PORT: env.PORT || undefined,
  }, 'environment');

  return {
    scalingPolicy: values.IMPACT_SCALING_POLICY,
    timeZone: values.TARGET_TIME_ZONE,
    logDomainClamps: values.LOG_DOMAIN_CLAMPS,
    targetCacheBackend: values.TARGET_CACHE_BACKEND,
    targetCacheCollection: values.TARGET_CACHE_COLLECTION,
    port: values.PORT,
    algorithmVersion: TARGET_ALGORITHM_VERSION,
  };
}

let cachedConfig: EngineConfig | null = null;

export function getEngineConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadEngineConfig();
  }
  return cachedConfig;
}
