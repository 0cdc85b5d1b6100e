import type { RequestContext } from '@tallyplan/core';
import type { PlanImportDeps } from '../deps';
import { detectColumnMapping as detectMapping } from '../services/column-mapping';
import { buildColumnProfilesFromSource } from '../services/column-profiler';
import type { ColumnMapping } from '../types';
import { detectColumnMappingSchema, parseInput } from '../validation';
import type { DetectColumnMappingInput } from '../validation';

export async function detectColumnMapping(
  deps: Pick<PlanImportDeps, 'source' | 'config' | 'logger'>,
  ctx: RequestContext,
  input: DetectColumnMappingInput,
): Promise<ColumnMapping> {
  const data = parseInput(detectColumnMappingSchema, input);
  const maxRows = data.maxRows ?? deps.config.profileSampleRows;
  const profiles = buildColumnProfilesFromSource(deps.source, data.sheetName, maxRows);
  const mapping = detectMapping(profiles, deps.source.getRows(data.sheetName));

  deps.logger.debug('Column mapping suggested', {
    requestId: ctx.requestId,
    sheetName: data.sheetName,
    ...mapping,
  });
  return mapping;
}
