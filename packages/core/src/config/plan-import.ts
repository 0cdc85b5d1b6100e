/**
 * Environment configuration for plan import: parsed once with zod and cached.
 */

import { z } from 'zod';
import { ValidationError } from '@tallyplan/shared';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PROFILE_SAMPLE_ROWS: z.coerce.number().int().min(1).max(10_000).default(100),
  GLOBAL_PROMOTION_MIN_USERS: z.coerce.number().int().min(1).default(3),
  HYDRATE_ON_ANALYZE: booleanFlag.default('true'),
});

export interface PlanImportConfig {
  env: 'development' | 'test' | 'production';
  profileSampleRows: number;
  globalPromotionMinUsers: number;
  hydrateOnAnalyze: boolean;
}

let _config: PlanImportConfig | null = null;

export function loadPlanImportConfig(env: NodeJS.ProcessEnv = process.env): PlanImportConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid plan import configuration',
      parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
    );
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    profileSampleRows: e.PROFILE_SAMPLE_ROWS,
    globalPromotionMinUsers: e.GLOBAL_PROMOTION_MIN_USERS,
    hydrateOnAnalyze: e.HYDRATE_ON_ANALYZE,
  };
}

export function getPlanImportConfig(): PlanImportConfig {
  if (_config) return _config;
  _config = loadPlanImportConfig();
  return _config;
}

/** Clears the cached config so the next read re-parses the environment. */
export function resetPlanImportConfig(): void {
  _config = null;
}
