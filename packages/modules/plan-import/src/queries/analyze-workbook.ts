import type { RequestContext } from '@tallyplan/core';
import { serializeError } from '@tallyplan/core';
import type { PlanImportDeps } from '../deps';
import { analyzeWorkbookSheets } from '../services/workbook-scanner';
import type { WorkbookAnalysis } from '../types';

/** Scores every sheet and suggests the one that looks most like a budget. */
export async function analyzeWorkbook(
  deps: Pick<PlanImportDeps, 'source' | 'logger'>,
  ctx: RequestContext,
): Promise<WorkbookAnalysis> {
  const result = analyzeWorkbookSheets(deps.source, (sheetName, err) => {
    deps.logger.warn('Skipping unreadable sheet', {
      requestId: ctx.requestId,
      sheetName,
      error: serializeError(err),
    });
  });

  deps.logger.info('Workbook analyzed', {
    requestId: ctx.requestId,
    userId: ctx.userId,
    sheets: result.sheets.length,
    suggestedSheet: result.suggestedSheet,
  });
  return result;
}
