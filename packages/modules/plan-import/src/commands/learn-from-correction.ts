import type { RequestContext } from '@tallyplan/core';
import type { PlanImportDeps } from '../deps';
import type { TagCorrection } from '../types';
import { learnFromCorrectionSchema, parseInput } from '../validation';
import type { LearnFromCorrectionInput } from '../validation';

/**
 * Persists a user's tag correction and applies it to their live overlay, so
 * the next analysis in this process already reflects it.
 */
export async function learnFromCorrection(
  deps: Pick<PlanImportDeps, 'learner'>,
  ctx: RequestContext,
  input: LearnFromCorrectionInput,
): Promise<TagCorrection> {
  const data = parseInput(learnFromCorrectionSchema, input);
  return deps.learner.saveCorrection({
    userId: ctx.userId,
    term: data.term,
    predictedTag: data.predictedTag ?? null,
    correctedTag: data.correctedTag,
    sourceFileId: data.sourceFileId,
  });
}
