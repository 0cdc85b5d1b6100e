import { describe, it, expect, vi } from 'vitest';
import { SheetReadError } from '@tallyplan/shared';
import { analyzeSheet, analyzeWorkbookSheets, isMonthHeader } from '../services/workbook-scanner';
import { GridWorkbookSource } from '../services/workbook-source';

const BUDGET_ROWS = [
  ['Category', 'Jan', 'Feb'],
  ['Rent', '1200', '1200'],
  ['Food', '300', '320'],
  ['12', 'x', 'y'],
];

describe('isMonthHeader', () => {
  it('recognizes English and Portuguese month names and abbreviations', () => {
    expect(isMonthHeader('Jan')).toBe(true);
    expect(isMonthHeader('March')).toBe(true);
    expect(isMonthHeader('Fev 2025')).toBe(true);
    expect(isMonthHeader('dezembro/24')).toBe(true);
  });

  it('rejects other labels', () => {
    expect(isMonthHeader('Rent')).toBe(false);
    expect(isMonthHeader('Ma')).toBe(false);
    expect(isMonthHeader('1200')).toBe(false);
  });
});

describe('analyzeSheet', () => {
  it('scores a data dump with a budget-like name', () => {
    const source = new GridWorkbookSource({
      'Budget 2025': { rows: BUDGET_ROWS, formulas: { B2: 'B3*4', C2: 'C3*4' } },
    });
    const analysis = analyzeSheet(source, 'Budget 2025');

    expect(analysis).toEqual({
      name: 'Budget 2025',
      type: 'data_dump',
      rowCount: 4,
      colCount: 3,
      formulaCount: 2,
      detectedCategories: ['Category', 'Rent', 'Food'],
      monthColumns: ['Jan', 'Feb'],
      previewRows: BUDGET_ROWS,
      score: 115,
    });
  });

  it('flags sheets with more than ten formulas as living plans', () => {
    const rows = Array.from({ length: 12 }, (_, i) => [`Item ${i + 1}`, String(i)]);
    const formulas = Object.fromEntries(Array.from({ length: 11 }, (_, i) => [`B${i + 1}`, `A${i + 1}*2`]));
    const analysis = analyzeSheet(new GridWorkbookSource({ Sheet1: { rows, formulas } }), 'Sheet1');

    expect(analysis.type).toBe('living_plan');
    expect(analysis.formulaCount).toBe(11);
    expect(analysis.score).toBe(100 + 11 + 12 * 10);
    expect(analysis.previewRows).toHaveLength(5);
  });
});

describe('analyzeWorkbookSheets', () => {
  it('suggests the highest-scoring sheet', () => {
    const source = new GridWorkbookSource({
      Notes: { rows: [['hello']] },
      'Budget 2025': { rows: BUDGET_ROWS },
    });
    const result = analyzeWorkbookSheets(source);
    expect(result.sheets.map((s) => [s.name, s.score])).toEqual([
      ['Notes', 55],
      ['Budget 2025', 115],
    ]);
    expect(result.suggestedSheet).toBe('Budget 2025');
  });

  it('reports unreadable sheets and keeps going', () => {
    class WithBrokenSheet extends GridWorkbookSource {
      override sheetNames(): string[] {
        return [...super.sheetNames(), 'Broken'];
      }
    }
    const onSheetError = vi.fn();
    const result = analyzeWorkbookSheets(new WithBrokenSheet({ Notes: { rows: [['hello']] } }), onSheetError);

    expect(result.sheets).toHaveLength(1);
    expect(result.suggestedSheet).toBe('Notes');
    expect(onSheetError).toHaveBeenCalledWith('Broken', expect.any(SheetReadError));
  });

  it('suggests nothing for an empty workbook', () => {
    expect(analyzeWorkbookSheets(new GridWorkbookSource({}))).toEqual({ sheets: [], suggestedSheet: null });
  });
});
