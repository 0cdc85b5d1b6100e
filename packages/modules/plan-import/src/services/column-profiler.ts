/**
 * Column Profiler: per-column statistics over the sampled rows of a sheet.
 *
 * Profiles are advisory: they feed column-mapping suggestions and the UI,
 * never the structural classifier.
 */

import { columnIndexToLetter, parseNumericValue, toCellRef } from '@tallyplan/shared';
import type { ColumnProfile } from '../types';
import type { WorkbookSource } from './workbook-source';

/** Rows skipped at the top of every sheet; titles and header rows live there. */
export const HEADER_GUARD_ROWS = 4;

/** Formula lookup by 1-based column index and 1-based row number. */
export type FormulaLookup = (columnIndex: number, row: number) => string;

const noFormulas: FormulaLookup = () => '';

interface ColumnTally {
  numeric: number;
  formula: number;
  empty: number;
  text: number;
  uniques: Set<string>;
  textLengthSum: number;
  nonEmpty: number;
}

function newTally(): ColumnTally {
  return { numeric: 0, formula: 0, empty: 0, text: 0, uniques: new Set(), textLengthSum: 0, nonEmpty: 0 };
}

/**
 * Profiles every column up to the widest sampled row.
 *
 * `maxRows` bounds the sample; zero, negative or larger than the sheet
 * means every row. Densities are fractions of the rows analyzed after the
 * header guard.
 */
export function profileColumns(
  rows: string[][],
  maxRows: number,
  formulaAt: FormulaLookup = noFormulas,
): ColumnProfile[] {
  const sampled = maxRows <= 0 || maxRows > rows.length ? rows.length : maxRows;

  let maxCols = 0;
  for (let r = 0; r < sampled; r++) {
    maxCols = Math.max(maxCols, rows[r]?.length ?? 0);
  }

  const tallies = Array.from({ length: maxCols }, newTally);

  for (let rowNumber = HEADER_GUARD_ROWS + 1; rowNumber <= sampled; rowNumber++) {
    const row = rows[rowNumber - 1] ?? [];
    for (let c = 0; c < maxCols; c++) {
      const tally = tallies[c]!;
      const value = (row[c] ?? '').trim();

      if (value === '') {
        tally.empty++;
      } else {
        tally.nonEmpty++;
        tally.uniques.add(value);
        tally.textLengthSum += value.length;
        if (parseNumericValue(value) !== null) {
          tally.numeric++;
        } else {
          tally.text++;
        }
      }

      if (formulaAt(c + 1, rowNumber) !== '') {
        tally.formula++;
      }
    }
  }

  const analyzed = Math.max(sampled - HEADER_GUARD_ROWS, 0) || 1;

  return tallies.map((t, c) => ({
    index: c + 1,
    letter: columnIndexToLetter(c + 1),
    numericDensity: t.numeric / analyzed,
    formulaDensity: t.formula / analyzed,
    emptyDensity: t.empty / analyzed,
    textDensity: t.text / analyzed,
    uniqueRatio: t.uniques.size / analyzed,
    avgTextLength: t.nonEmpty > 0 ? t.textLengthSum / t.nonEmpty : 0,
  }));
}

export function buildColumnProfilesFromSource(
  source: WorkbookSource,
  sheetName: string,
  maxRows: number,
): ColumnProfile[] {
  const rows = source.getRows(sheetName);
  return profileColumns(rows, maxRows, (columnIndex, row) =>
    source.getCellFormula(sheetName, toCellRef(columnIndex, row)),
  );
}
