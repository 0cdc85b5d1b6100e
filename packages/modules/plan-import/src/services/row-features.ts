import { parseNumericValue } from '@tallyplan/shared';
import type { RowFeatures } from '../types';

export interface RowFeatureInput {
  /** Category cell text, untrimmed so leading-space indentation survives */
  categoryText: string;
  valueText: string;
  /** Style identifier of the category cell; > 0 means emphasized */
  styleId: number;
  hasFormula: boolean;
  /** 1-based sheet row */
  rowIndex: number;
  totalRows: number;
}

export function extractRowFeatures(input: RowFeatureInput): RowFeatures {
  const category = input.categoryText;
  const label = category.trim();
  const value = input.valueText.trim();
  const parsed = parseNumericValue(value);

  return {
    hasValue: value !== '' && value !== '0',
    isBold: input.styleId > 0,
    isUppercase: label.length > 2 && label === label.toUpperCase(),
    indentation: category.length - category.replace(/^ +/, '').length,
    rowPosition: input.totalRows > 0 ? input.rowIndex / input.totalRows : 0,
    hasFormula: input.hasFormula,
    valueMagnitude: parsed !== null && parsed > 0 ? parsed : 0,
  };
}
