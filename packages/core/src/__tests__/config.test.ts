import { describe, it, expect, afterEach } from 'vitest';
import { loadPlanImportConfig, getPlanImportConfig, resetPlanImportConfig } from '../config';
import { ValidationError } from '@tallyplan/shared';

describe('plan import config', () => {
  afterEach(() => {
    resetPlanImportConfig();
  });

  it('applies defaults for an empty environment', () => {
    const config = loadPlanImportConfig({});
    expect(config).toEqual({
      env: 'development',
      profileSampleRows: 100,
      globalPromotionMinUsers: 3,
      hydrateOnAnalyze: true,
    });
  });

  it('coerces numeric and boolean variables', () => {
    const config = loadPlanImportConfig({
      PROFILE_SAMPLE_ROWS: '250',
      GLOBAL_PROMOTION_MIN_USERS: '5',
      HYDRATE_ON_ANALYZE: 'false',
    });
    expect(config.profileSampleRows).toBe(250);
    expect(config.globalPromotionMinUsers).toBe(5);
    expect(config.hydrateOnAnalyze).toBe(false);
  });

  it('leaves database and logging variables to their own packages', () => {
    const config = loadPlanImportConfig({ DATABASE_URL: 'not a url', DB_POOL_MAX: 'many', LOG_LEVEL: 'verbose' });
    expect(config).toEqual(loadPlanImportConfig({}));
  });

  it('rejects invalid values with field details', () => {
    try {
      loadPlanImportConfig({ PROFILE_SAMPLE_ROWS: 'lots' });
      expect.unreachable('config should not parse');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.details?.[0]?.field).toBe('PROFILE_SAMPLE_ROWS');
      }
    }
  });

  it('caches the parsed config until reset', () => {
    const first = getPlanImportConfig();
    expect(getPlanImportConfig()).toBe(first);
    resetPlanImportConfig();
    expect(getPlanImportConfig()).not.toBe(first);
  });
});
