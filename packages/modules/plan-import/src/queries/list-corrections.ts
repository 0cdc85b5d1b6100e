import type { RequestContext } from '@tallyplan/core';
import type { PlanImportDeps } from '../deps';
import type { TagCorrection } from '../types';

export async function listCorrections(
  deps: Pick<PlanImportDeps, 'learner'>,
  ctx: RequestContext,
): Promise<TagCorrection[]> {
  return deps.learner.listCorrections(ctx.userId);
}
