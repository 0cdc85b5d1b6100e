import type { PlanImportDeps } from '../deps';

/**
 * Copies corrections that enough users agree on into the shared global
 * overlay. Meant for startup and a periodic job, not a user request.
 */
export async function promoteGlobalCorrections(
  deps: Pick<PlanImportDeps, 'learner' | 'config'>,
  minUsers: number = deps.config.globalPromotionMinUsers,
): Promise<number> {
  return deps.learner.hydrateGlobal(minUsers);
}
