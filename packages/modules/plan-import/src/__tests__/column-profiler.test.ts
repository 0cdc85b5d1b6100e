import { describe, it, expect } from 'vitest';
import { buildColumnProfilesFromSource, profileColumns } from '../services/column-profiler';
import { GridWorkbookSource } from '../services/workbook-source';

const ROWS: string[][] = [
  ['Budget'],
  [],
  [],
  ['Category', 'Value'],
  ['Rent', '1200'],
  ['Food', '300,50'],
  ['', 'abc'],
  ['Rent', ''],
];

describe('profileColumns', () => {
  it('returns all-zero densities when nothing survives the header guard', () => {
    const profiles = profileColumns([['Title'], ['a', 'b'], ['', ''], ['x']], 100);
    expect(profiles).toEqual([
      { index: 1, letter: 'A', numericDensity: 0, formulaDensity: 0, emptyDensity: 0, textDensity: 0, uniqueRatio: 0, avgTextLength: 0 },
      { index: 2, letter: 'B', numericDensity: 0, formulaDensity: 0, emptyDensity: 0, textDensity: 0, uniqueRatio: 0, avgTextLength: 0 },
    ]);
  });

  it('returns no profiles for an empty sheet', () => {
    expect(profileColumns([], 50)).toEqual([]);
  });

  it('computes densities over the rows after the header guard', () => {
    const formulaAt = (col: number, row: number) => (col === 2 && row === 5 ? 'SUM(C5:D5)' : '');
    const [a, b] = profileColumns(ROWS, 0, formulaAt);

    expect(a).toMatchObject({ letter: 'A', textDensity: 0.75, emptyDensity: 0.25, numericDensity: 0, formulaDensity: 0 });
    expect(a?.uniqueRatio).toBe(0.5);
    expect(a?.avgTextLength).toBe(4);

    expect(b).toMatchObject({ letter: 'B', numericDensity: 0.5, textDensity: 0.25, emptyDensity: 0.25, formulaDensity: 0.25 });
    expect(b?.uniqueRatio).toBe(0.75);
    expect(b?.avgTextLength).toBeCloseTo(13 / 3);
  });

  it('bounds the sample with maxRows', () => {
    const [a] = profileColumns(ROWS, 6);
    expect(a?.textDensity).toBe(1);
    expect(a?.emptyDensity).toBe(0);
  });

  it('is deterministic', () => {
    expect(profileColumns(ROWS, 100)).toEqual(profileColumns(ROWS, 100));
  });
});

describe('buildColumnProfilesFromSource', () => {
  it('reads formulas through the workbook source', () => {
    const source = new GridWorkbookSource({ Plan: { rows: ROWS, formulas: { B5: 'B6*2', B6: '150' } } });
    const [, b] = buildColumnProfilesFromSource(source, 'Plan', 100);
    expect(b?.formulaDensity).toBe(0.5);
  });
});
