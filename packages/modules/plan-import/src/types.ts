/**
 * Types for spreadsheet budget plan inference.
 */

// ── Confidence ───────────────────────────────────────────────────────

/**
 * Sovereign-Certainty threshold. Nodes at or above it are auto-approved,
 * nodes below it are flagged for review.
 */
export const CONFIDENCE_THRESHOLD = 0.8;

export function needsReview(confidence: number): boolean {
  return confidence < CONFIDENCE_THRESHOLD;
}

// ── Node Type / Item Tag ─────────────────────────────────────────────

export const NODE_TYPES = ['GROUP', 'ITEM', 'IGNORE'] as const;
export type NodeType = (typeof NODE_TYPES)[number];

export const ITEM_TAGS = ['budget', 'recurring', 'savings', 'income', 'debt', 'unknown'] as const;
export type ItemTag = (typeof ITEM_TAGS)[number];

/** Tags a correction may assign (`unknown` is never a correction target). */
export const CORRECTABLE_TAGS = ['budget', 'recurring', 'savings', 'income', 'debt'] as const;
export type CorrectableTag = (typeof CORRECTABLE_TAGS)[number];

/** Short codes used by legacy exports and older clients. */
export const ITEM_TAG_CODES: Record<ItemTag, string> = {
  budget: 'B',
  recurring: 'R',
  savings: 'S',
  income: 'IN',
  debt: 'D',
  unknown: '',
};

// ── Column Profiling ─────────────────────────────────────────────────

export interface ColumnProfile {
  /** 1-based column index */
  index: number;
  letter: string;
  numericDensity: number;
  formulaDensity: number;
  emptyDensity: number;
  textDensity: number;
  uniqueRatio: number;
  avgTextLength: number;
}

export interface ColumnMapping {
  categoryColumn: string;
  valueColumn: string;
  /** First data row (1-based), just below any detected header row */
  headerRow: number;
  confidence: number;
}

// ── Row Classification ───────────────────────────────────────────────

export interface RowFeatures {
  hasValue: boolean;
  isBold: boolean;
  isUppercase: boolean;
  indentation: number;
  rowPosition: number;
  hasFormula: boolean;
  valueMagnitude: number;
}

export interface StructuralClassification {
  type: NodeType;
  confidence: number;
  rule: string;
}

// ── Tag Prediction ───────────────────────────────────────────────────

export type PredictionSource = 'user' | 'global' | 'baseline' | 'none';

export interface TagPrediction {
  tag: ItemTag;
  confidence: number;
  source: PredictionSource;
}

export interface TermCorrection {
  term: string;
  tag: CorrectableTag;
}

// ── Analysis Tree ────────────────────────────────────────────────────

export interface AnalysisNode {
  id: string;
  name: string;
  value: number;
  type: NodeType;
  tag: ItemTag;
  confidence: number;
  needsReview: boolean;
  isAutoApproved: boolean;
  /** Category cell reference, e.g. "A7"; empty for synthetic groups */
  cellRef: string;
  /** 1-based sheet row; 0 for synthetic groups */
  row: number;
  formula?: string;
  children: AnalysisNode[];
}

export interface AnalysisTreeResult {
  sheetName: string;
  nodes: AnalysisNode[];
  totalGroups: number;
  totalItems: number;
  overallConfidence: number;
  itemsNeedingReview: number;
  autoApprovedItems: number;
  columnProfiles?: ColumnProfile[];
  detectedMapping?: ColumnMapping;
}

// ── Workbook Scan ────────────────────────────────────────────────────

export type SheetType = 'data_dump' | 'living_plan';

export interface SheetAnalysis {
  name: string;
  type: SheetType;
  rowCount: number;
  colCount: number;
  formulaCount: number;
  detectedCategories: string[];
  monthColumns: string[];
  previewRows: string[][];
  score: number;
}

export interface WorkbookAnalysis {
  sheets: SheetAnalysis[];
  suggestedSheet: string | null;
}

// ── Corrections ──────────────────────────────────────────────────────

export const CORRECTION_MODEL_TYPES = ['TEXT', 'STRUCTURE'] as const;
export type CorrectionModelType = (typeof CORRECTION_MODEL_TYPES)[number];

export interface TagCorrection {
  id: string;
  userId: string;
  term: string;
  predictedTag: string | null;
  correctedTag: string;
  modelType: CorrectionModelType;
  sourceFileId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CorrectedTermStat {
  term: string;
  correctedTag: string;
  userCount: number;
}
