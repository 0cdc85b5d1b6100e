import { CorrectionHydrationError } from '@tallyplan/shared';
import { serializeError } from '@tallyplan/core';
import type { RequestContext } from '@tallyplan/core';
import type { PlanImportDeps } from '../deps';
import { detectColumnMapping } from '../services/column-mapping';
import { buildColumnProfilesFromSource } from '../services/column-profiler';
import { buildAnalysisTree } from '../services/tree-builder';
import type { AnalysisTreeResult } from '../types';
import { analyzeSheetTreeSchema, parseInput } from '../validation';
import type { AnalyzeSheetTreeInput } from '../validation';

/**
 * Builds the GROUP → ITEM tree for one sheet, predicting tags through the
 * caller's corrections. The caller's overlay is hydrated first when it has
 * not been loaded in this process yet; if the correction store is down the
 * tree is still built from the global and baseline layers.
 */
export async function analyzeSheetTree(
  deps: PlanImportDeps,
  ctx: RequestContext,
  input: AnalyzeSheetTreeInput,
): Promise<AnalysisTreeResult> {
  const data = parseInput(analyzeSheetTreeSchema, input);
  const startedAt = Date.now();

  if (deps.config.hydrateOnAnalyze && !deps.learner.isHydrated(ctx.userId)) {
    try {
      await deps.learner.hydrateForUser(ctx.userId);
    } catch (err) {
      if (!(err instanceof CorrectionHydrationError)) throw err;
      deps.logger.warn('Analyzing without user corrections', {
        requestId: ctx.requestId,
        userId: ctx.userId,
        error: serializeError(err),
      });
    }
  }

  const result = buildAnalysisTree({
    source: deps.source,
    sheetName: data.sheetName,
    categoryColumn: data.categoryColumn,
    valueColumn: data.valueColumn,
    startRow: data.startRow,
    predictor: deps.learner.predictorFor(ctx.userId),
  });

  if (data.includeProfiles) {
    const profiles = buildColumnProfilesFromSource(deps.source, data.sheetName, deps.config.profileSampleRows);
    result.columnProfiles = profiles;
    result.detectedMapping = detectColumnMapping(profiles, deps.source.getRows(data.sheetName));
  }

  deps.logger.info('Sheet tree analyzed', {
    requestId: ctx.requestId,
    userId: ctx.userId,
    sheetName: data.sheetName,
    totalGroups: result.totalGroups,
    totalItems: result.totalItems,
    itemsNeedingReview: result.itemsNeedingReview,
    overallConfidence: result.overallConfidence,
    durationMs: Date.now() - startedAt,
  });
  return result;
}
