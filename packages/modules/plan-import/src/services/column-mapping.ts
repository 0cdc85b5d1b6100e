/**
 * Suggests which columns hold category names and budget values, and where
 * the data starts, from column profiles plus the first rows of the sheet.
 */

import type { ColumnMapping, ColumnProfile } from '../types';

const HEADER_SCAN_ROWS = 10;

const HEADER_HINTS = [
  'month', 'meses', 'category', 'categoria', 'value', 'valor',
  'jan', 'current', 'atual', 'budget', 'orçamento', '%',
];

const FALLBACK_CATEGORY = 'A';
const FALLBACK_VALUE = 'C';

function pickCategoryColumn(profiles: ColumnProfile[]): ColumnProfile | null {
  let best: ColumnProfile | null = null;
  for (const p of profiles) {
    if (p.textDensity <= 0) continue;
    if (!best || p.textDensity > best.textDensity) best = p;
  }
  return best;
}

function valueScore(p: ColumnProfile): number {
  // Formula-bearing columns are the strongest signal of a living budget
  return p.numericDensity + 2 * p.formulaDensity;
}

function pickValueColumn(profiles: ColumnProfile[], exclude: number | null): ColumnProfile | null {
  let best: ColumnProfile | null = null;
  for (const p of profiles) {
    if (p.index === exclude) continue;
    if (valueScore(p) <= 0) continue;
    if (!best || valueScore(p) > valueScore(best)) best = p;
  }
  return best;
}

/**
 * Returns the first data row (1-based): the row after the first of the top
 * rows carrying at least two header hints, or 1 when none does.
 */
export function detectDataStartRow(rows: string[][]): number {
  const limit = Math.min(HEADER_SCAN_ROWS, rows.length);
  for (let r = 0; r < limit; r++) {
    const hints = (rows[r] ?? []).filter((cell) => {
      const lower = cell.trim().toLowerCase();
      return lower !== '' && HEADER_HINTS.some((hint) => lower.includes(hint));
    }).length;
    if (hints >= 2) return r + 2;
  }
  return 1;
}

export function detectColumnMapping(profiles: ColumnProfile[], rows: string[][]): ColumnMapping {
  const category = pickCategoryColumn(profiles);
  const value = pickValueColumn(profiles, category?.index ?? null);

  let confidence = 0.5;
  if (category && value) {
    if (category.textDensity >= 0.25 && value.numericDensity >= 0.25) confidence = 0.8;
    if (category.letter === 'A' && value.numericDensity >= 0.5) confidence = 0.9;
    confidence = Math.min(1, confidence + 0.05);
  }

  const categoryColumn = category?.letter ?? FALLBACK_CATEGORY;
  let valueColumn = value?.letter ?? FALLBACK_VALUE;
  if (!category || !value) {
    confidence = 0.3;
    if (!value && categoryColumn === FALLBACK_VALUE) valueColumn = 'B';
  }

  return {
    categoryColumn,
    valueColumn,
    headerRow: detectDataStartRow(rows),
    confidence,
  };
}
