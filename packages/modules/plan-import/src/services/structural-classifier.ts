/**
 * Structural Classifier: decides whether a row is a category header (GROUP),
 * a budget line (ITEM) or noise (IGNORE).
 *
 * Rules are evaluated top to bottom and the first match wins. The order is
 * part of the contract: e.g. an uppercase label without a value is a GROUP at
 * 0.95 (rule 1), never at 0.85 (rule 2).
 */

import type { NodeType, RowFeatures, StructuralClassification } from '../types';

export interface ClassificationRule {
  name: string;
  matches: (features: RowFeatures, category: string) => boolean;
  type: NodeType;
  confidence: (features: RowFeatures) => number;
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'category-without-value',
    matches: (f, category) => category !== '' && !f.hasValue,
    type: 'GROUP',
    confidence: () => 0.95,
  },
  {
    name: 'uppercase-heading',
    matches: (f, category) => f.isUppercase && category.length > 3,
    type: 'GROUP',
    confidence: () => 0.85,
  },
  {
    name: 'styled-heading',
    matches: (f) => f.isBold && !f.hasValue,
    type: 'GROUP',
    confidence: () => 0.8,
  },
  {
    name: 'indented-line',
    matches: (f) => f.indentation > 0,
    type: 'ITEM',
    confidence: () => 0.9,
  },
  {
    name: 'valued-line',
    matches: (f) => f.hasValue,
    type: 'ITEM',
    // Formula-driven values are almost always real budget lines
    confidence: (f) => (f.hasFormula ? 0.85 : 0.7),
  },
  {
    name: 'fallback',
    matches: () => true,
    type: 'IGNORE',
    confidence: () => 0.5,
  },
];

export function classifyRow(
  features: RowFeatures,
  category: string,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES,
): StructuralClassification {
  for (const rule of rules) {
    if (rule.matches(features, category)) {
      return { type: rule.type, confidence: rule.confidence(features), rule: rule.name };
    }
  }
  return { type: 'IGNORE', confidence: 0.5, rule: 'fallback' };
}
