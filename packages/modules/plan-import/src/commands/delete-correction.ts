import type { RequestContext } from '@tallyplan/core';
import type { PlanImportDeps } from '../deps';
import { deleteCorrectionSchema, parseInput } from '../validation';
import type { DeleteCorrectionInput } from '../validation';

export async function deleteCorrection(
  deps: Pick<PlanImportDeps, 'learner'>,
  ctx: RequestContext,
  input: DeleteCorrectionInput,
): Promise<void> {
  const data = parseInput(deleteCorrectionSchema, input);
  await deps.learner.deleteCorrection(ctx.userId, data.term);
}
