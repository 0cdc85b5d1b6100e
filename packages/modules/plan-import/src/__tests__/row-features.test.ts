import { describe, it, expect } from 'vitest';
import { extractRowFeatures } from '../services/row-features';

const base = { styleId: 0, hasFormula: false, rowIndex: 5, totalRows: 10 };

describe('extractRowFeatures', () => {
  it('keeps leading-space indentation and parses the value', () => {
    const f = extractRowFeatures({ ...base, categoryText: '  Groceries', valueText: '45.00' });
    expect(f).toEqual({
      hasValue: true,
      isBold: false,
      isUppercase: false,
      indentation: 2,
      rowPosition: 0.5,
      hasFormula: false,
      valueMagnitude: 45,
    });
  });

  it('detects uppercase headings without a value', () => {
    const f = extractRowFeatures({ ...base, categoryText: 'RENT', valueText: '' });
    expect(f.isUppercase).toBe(true);
    expect(f.hasValue).toBe(false);
    expect(f.indentation).toBe(0);
    expect(f.valueMagnitude).toBe(0);
  });

  it('requires more than two characters for uppercase', () => {
    expect(extractRowFeatures({ ...base, categoryText: 'TV', valueText: '' }).isUppercase).toBe(false);
  });

  it('treats "0" as no value', () => {
    expect(extractRowFeatures({ ...base, categoryText: 'Gym', valueText: ' 0 ' }).hasValue).toBe(false);
  });

  it('keeps negative values out of the magnitude', () => {
    const f = extractRowFeatures({ ...base, categoryText: 'Refund', valueText: '(45.00)' });
    expect(f.hasValue).toBe(true);
    expect(f.valueMagnitude).toBe(0);
  });

  it('marks any positive style id as bold', () => {
    expect(extractRowFeatures({ ...base, categoryText: 'Bills', valueText: '', styleId: 3 }).isBold).toBe(true);
  });

  it('reports a zero row position for an empty sheet', () => {
    expect(extractRowFeatures({ ...base, categoryText: 'x', valueText: '', totalRows: 0 }).rowPosition).toBe(0);
  });
});
