/**
 * Workbook Scanner: scores every sheet so the UI can preselect the one that
 * most looks like a living budget (formulas, category labels, a budget-ish name).
 */

import { parseNumericValue, toCellRef } from '@tallyplan/shared';
import type { SheetAnalysis, WorkbookAnalysis } from '../types';
import type { WorkbookSource } from './workbook-source';

const LIVING_PLAN_MIN_FORMULAS = 10;
const MONTH_SCAN_ROWS = 10;
const CATEGORY_SCAN_ROWS = 100;
const PREVIEW_ROWS = 5;
const PREVIEW_COLS = 10;

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
  'janeiro', 'fevereiro', 'março', 'abril', 'maio', 'junho',
  'julho', 'agosto', 'setembro', 'outubro', 'novembro', 'dezembro',
];

const BUDGET_SHEET_NAME_HINTS = ['budget', 'orc', 'orç', 'plan', 'despesas'];

/**
 * True for "Jan", "March", "Fev 2025", "dezembro/24": a month name or a
 * prefix of one (3+ letters), optionally followed by a year.
 */
export function isMonthHeader(value: string): boolean {
  const match = /^([\p{L}]{3,})\.?(?:[\s/-]*\d{2,4})?$/u.exec(value.trim().toLowerCase());
  if (!match) return false;
  const word = match[1]!;
  return MONTH_NAMES.some((name) => name.startsWith(word));
}

export function isCategoryLike(value: string): boolean {
  const text = value.trim();
  if (text.length < 3 || text.length > 50) return false;
  return parseNumericValue(text) === null;
}

export function analyzeSheet(source: WorkbookSource, sheetName: string): SheetAnalysis {
  const rows = source.getRows(sheetName);
  const colCount = rows.reduce((max, row) => Math.max(max, row.length), 0);

  let formulaCount = 0;
  const monthColumns: string[] = [];
  const detectedCategories: string[] = [];

  rows.forEach((row, r) => {
    for (let c = 0; c < colCount; c++) {
      if (source.getCellFormula(sheetName, toCellRef(c + 1, r + 1)) !== '') formulaCount++;

      const value = (row[c] ?? '').trim();
      if (r < MONTH_SCAN_ROWS && isMonthHeader(value)) {
        monthColumns.push(value);
      }
    }
    const first = row[0] ?? '';
    if (r < CATEGORY_SCAN_ROWS && isCategoryLike(first)) {
      detectedCategories.push(first.trim());
    }
  });

  const isLivingPlan = formulaCount > LIVING_PLAN_MIN_FORMULAS;
  let score = isLivingPlan
    ? 100 + formulaCount + detectedCategories.length * 10
    : 50 + detectedCategories.length * 5;

  const nameLower = sheetName.toLowerCase();
  if (BUDGET_SHEET_NAME_HINTS.some((hint) => nameLower.includes(hint))) {
    score += 50;
  }

  return {
    name: sheetName,
    type: isLivingPlan ? 'living_plan' : 'data_dump',
    rowCount: rows.length,
    colCount,
    formulaCount,
    detectedCategories,
    monthColumns,
    previewRows: rows.slice(0, PREVIEW_ROWS).map((row) => row.slice(0, PREVIEW_COLS)),
    score,
  };
}

/**
 * Analyzes every sheet. Sheets that cannot be read are reported through
 * `onSheetError` and left out; the suggestion is the highest-scoring sheet.
 */
export function analyzeWorkbookSheets(
  source: WorkbookSource,
  onSheetError?: (sheetName: string, err: unknown) => void,
): WorkbookAnalysis {
  const sheets: SheetAnalysis[] = [];
  let suggestedSheet: string | null = null;
  let bestScore = -Infinity;

  for (const name of source.sheetNames()) {
    let analysis: SheetAnalysis;
    try {
      analysis = analyzeSheet(source, name);
    } catch (err) {
      onSheetError?.(name, err);
      continue;
    }
    sheets.push(analysis);
    if (analysis.score > bestScore) {
      bestScore = analysis.score;
      suggestedSheet = name;
    }
  }

  return { sheets, suggestedSheet };
}
