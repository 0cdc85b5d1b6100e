import { getPlanImportConfig, logger as rootLogger } from '@tallyplan/core';
import type { Logger, PlanImportConfig } from '@tallyplan/core';
import type { WorkbookSource } from './services/workbook-source';
import { TagPredictor } from './services/tag-predictor';
import { CorrectionLearner } from './services/correction-learner';
import type { TagCorrectionStore } from './stores/tag-correction-store';

/** Everything the commands and queries need for one uploaded workbook. */
export interface PlanImportDeps {
  source: WorkbookSource;
  predictor: TagPredictor;
  learner: CorrectionLearner;
  config: PlanImportConfig;
  logger: Logger;
}

export interface CreatePlanImportDepsOptions {
  store: TagCorrectionStore;
  predictor?: TagPredictor;
  config?: PlanImportConfig;
  logger?: Logger;
}

/**
 * Process-wide pieces: one predictor and one learner shared by every
 * request. Bind a workbook per request with `withSource`.
 */
export interface PlanImportEngine {
  predictor: TagPredictor;
  learner: CorrectionLearner;
  config: PlanImportConfig;
  logger: Logger;
  withSource(source: WorkbookSource): PlanImportDeps;
}

export function createPlanImportEngine(options: CreatePlanImportDepsOptions): PlanImportEngine {
  const config = options.config ?? getPlanImportConfig();
  const logger = options.logger ?? rootLogger;
  const predictor = options.predictor ?? new TagPredictor();
  const learner = new CorrectionLearner(predictor, options.store, logger);
  return {
    predictor,
    learner,
    config,
    logger,
    withSource: (source) => ({ source, predictor, learner, config, logger }),
  };
}
