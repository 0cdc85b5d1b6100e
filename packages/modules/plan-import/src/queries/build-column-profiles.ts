import type { RequestContext } from '@tallyplan/core';
import type { PlanImportDeps } from '../deps';
import { buildColumnProfilesFromSource } from '../services/column-profiler';
import type { ColumnProfile } from '../types';
import { buildColumnProfilesSchema, parseInput } from '../validation';
import type { BuildColumnProfilesInput } from '../validation';

/** Per-column statistics for the first `maxRows` rows (config default when omitted). */
export async function buildColumnProfiles(
  deps: Pick<PlanImportDeps, 'source' | 'config' | 'logger'>,
  ctx: RequestContext,
  input: BuildColumnProfilesInput,
): Promise<ColumnProfile[]> {
  const data = parseInput(buildColumnProfilesSchema, input);
  const maxRows = data.maxRows ?? deps.config.profileSampleRows;
  const profiles = buildColumnProfilesFromSource(deps.source, data.sheetName, maxRows);

  deps.logger.debug('Column profiles built', {
    requestId: ctx.requestId,
    userId: ctx.userId,
    sheetName: data.sheetName,
    columns: profiles.length,
    maxRows,
  });
  return profiles;
}
