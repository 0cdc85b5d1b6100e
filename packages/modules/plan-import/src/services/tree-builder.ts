/**
 * Tree Builder: walks a sheet top to bottom and assembles the two-level
 * GROUP → ITEM tree.
 *
 * Group membership is positional: an ITEM belongs to the nearest GROUP above
 * it, so rows are processed strictly in order.
 */

import {
  ValidationError,
  columnLetterToIndex,
  createIdFactory,
  isColumnLetter,
  parseNumericValue,
  toCellRef,
} from '@tallyplan/shared';
import type { IdFactory } from '@tallyplan/shared';
import { needsReview } from '../types';
import type { AnalysisNode, AnalysisTreeResult } from '../types';
import { extractRowFeatures } from './row-features';
import { classifyRow } from './structural-classifier';
import type { TagPredictorView } from './tag-predictor';
import type { WorkbookSource } from './workbook-source';

export const DEFAULT_GROUP_NAME = 'Imported Items';
export const DEFAULT_GROUP_CONFIDENCE = 0.5;

export interface BuildTreeInput {
  source: WorkbookSource;
  sheetName: string;
  categoryColumn: string;
  valueColumn: string;
  /** 1-based; anything below 1 starts at the first row */
  startRow: number;
  predictor: TagPredictorView;
  nextId?: IdFactory;
}

export type TreeSummary = Omit<AnalysisTreeResult, 'sheetName' | 'nodes' | 'columnProfiles' | 'detectedMapping'>;

function resolveColumn(field: string, letter: string): number {
  const normalized = letter.trim().toUpperCase();
  if (!isColumnLetter(normalized)) {
    throw new ValidationError(`Invalid column letter "${letter}"`, [
      { field, message: 'must be a column letter such as A or AB' },
    ]);
  }
  return columnLetterToIndex(normalized);
}

function syntheticGroup(id: string, firstChild: AnalysisNode): AnalysisNode {
  return {
    id,
    name: DEFAULT_GROUP_NAME,
    value: 0,
    type: 'GROUP',
    tag: 'unknown',
    confidence: DEFAULT_GROUP_CONFIDENCE,
    needsReview: true,
    isAutoApproved: false,
    cellRef: '',
    row: 0,
    children: [firstChild],
  };
}

export function buildAnalysisTree(input: BuildTreeInput): AnalysisTreeResult {
  const { source, sheetName, predictor } = input;
  const catIdx = resolveColumn('categoryColumn', input.categoryColumn);
  const valIdx = resolveColumn('valueColumn', input.valueColumn);
  const nextId = input.nextId ?? createIdFactory();

  const rows = source.getRows(sheetName);
  const totalRows = rows.length;
  const firstRow = Math.max(1, Math.floor(input.startRow));

  const nodes: AnalysisNode[] = [];
  let current: AnalysisNode | null = null;

  for (let rowNumber = firstRow; rowNumber <= totalRows; rowNumber++) {
    const row = rows[rowNumber - 1] ?? [];
    const categoryText = row[catIdx - 1] ?? '';
    const name = categoryText.trim();
    if (name === '') continue;

    const valueText = (row[valIdx - 1] ?? '').trim();
    const catCell = toCellRef(catIdx, rowNumber);
    const valCell = toCellRef(valIdx, rowNumber);
    const formula = source.getCellFormula(sheetName, valCell);

    const features = extractRowFeatures({
      categoryText,
      valueText,
      styleId: source.getCellStyle(sheetName, catCell),
      hasFormula: formula !== '',
      rowIndex: rowNumber,
      totalRows,
    });
    const structural = classifyRow(features, name);
    if (structural.type === 'IGNORE') continue;

    const prediction = predictor.predict(name);
    const confidence = (structural.confidence + prediction.confidence) / 2;
    const review = needsReview(confidence);

    const node: AnalysisNode = {
      id: nextId(),
      name,
      value: parseNumericValue(valueText) ?? 0,
      type: structural.type,
      tag: prediction.tag,
      confidence,
      needsReview: review,
      isAutoApproved: !review,
      cellRef: catCell,
      row: rowNumber,
      ...(formula !== '' ? { formula } : {}),
      children: [],
    };

    if (structural.type === 'GROUP') {
      if (current) nodes.push(current);
      current = node;
    } else if (current) {
      current.children.push(node);
    } else {
      current = syntheticGroup(nextId(), node);
    }
  }

  if (current) nodes.push(current);

  return { sheetName, nodes, ...summarizeTree(nodes) };
}

/** Totals over a built tree. Review counters count ITEM nodes only. */
export function summarizeTree(nodes: readonly AnalysisNode[]): TreeSummary {
  let totalItems = 0;
  let confidenceSum = 0;
  let itemsNeedingReview = 0;
  let autoApprovedItems = 0;

  for (const group of nodes) {
    confidenceSum += group.confidence;
    for (const item of group.children) {
      totalItems++;
      confidenceSum += item.confidence;
      if (item.needsReview) itemsNeedingReview++;
      else autoApprovedItems++;
    }
  }

  const totalNodes = nodes.length + totalItems;
  return {
    totalGroups: nodes.length,
    totalItems,
    overallConfidence: totalNodes > 0 ? confidenceSum / totalNodes : 0,
    itemsNeedingReview,
    autoApprovedItems,
  };
}
