export const MODULE_KEY = 'plan_import' as const;
export const MODULE_NAME = 'Budget Plan Import';
export const MODULE_VERSION = '0.1.0';

// ── Commands ─────────────────────────────────────────────────────────
export { learnFromCorrection } from './commands/learn-from-correction';
export { deleteCorrection } from './commands/delete-correction';
export { promoteGlobalCorrections } from './commands/promote-global-corrections';

// ── Queries ──────────────────────────────────────────────────────────
export { analyzeSheetTree } from './queries/analyze-sheet-tree';
export { buildColumnProfiles } from './queries/build-column-profiles';
export { detectColumnMapping } from './queries/detect-column-mapping';
export { analyzeWorkbook } from './queries/analyze-workbook';
export { listCorrections } from './queries/list-corrections';

// ── Wiring ───────────────────────────────────────────────────────────
export { createPlanImportEngine } from './deps';
export type { PlanImportDeps, PlanImportEngine, CreatePlanImportDepsOptions } from './deps';

// ── Services (for testing / direct use) ──────────────────────────────
export { profileColumns, buildColumnProfilesFromSource, HEADER_GUARD_ROWS } from './services/column-profiler';
export { detectColumnMapping as suggestColumnMapping, detectDataStartRow } from './services/column-mapping';
export { analyzeSheet, analyzeWorkbookSheets, isMonthHeader } from './services/workbook-scanner';
export { extractRowFeatures } from './services/row-features';
export { classifyRow, CLASSIFICATION_RULES } from './services/structural-classifier';
export { TermMemory, normalizeTerm } from './services/term-memory';
export {
  TagPredictor,
  ScopedTagPredictor,
  baselineTermsSchema,
  USER_OVERLAY_CONFIDENCE,
  GLOBAL_OVERLAY_CONFIDENCE,
  UNKNOWN_CONFIDENCE,
} from './services/tag-predictor';
export { buildAnalysisTree, summarizeTree, DEFAULT_GROUP_NAME } from './services/tree-builder';
export { CorrectionLearner } from './services/correction-learner';
export { GridWorkbookSource } from './services/workbook-source';
export { XlsxWorkbookSource } from './services/xlsx-workbook';
export { parseBudgetCsv, parseCsvWorkbook, detectDelimiter } from './services/csv-workbook';
export { InMemoryTagCorrectionStore } from './stores/tag-correction-store';
export { DrizzleTagCorrectionStore } from './stores/drizzle-tag-correction-store';
export { isItemTag, isCorrectableTag, parseItemTag, parseCorrectableTag, toTagCode } from './tags';

// ── Validation Schemas ───────────────────────────────────────────────
export {
  analyzeSheetTreeSchema,
  buildColumnProfilesSchema,
  detectColumnMappingSchema,
  learnFromCorrectionSchema,
  deleteCorrectionSchema,
} from './validation';

export type {
  AnalyzeSheetTreeInput,
  BuildColumnProfilesInput,
  DetectColumnMappingInput,
  LearnFromCorrectionInput,
  DeleteCorrectionInput,
} from './validation';

// ── Types ────────────────────────────────────────────────────────────
export {
  CONFIDENCE_THRESHOLD,
  needsReview,
  NODE_TYPES,
  ITEM_TAGS,
  CORRECTABLE_TAGS,
  ITEM_TAG_CODES,
  CORRECTION_MODEL_TYPES,
} from './types';

export type {
  NodeType,
  ItemTag,
  CorrectableTag,
  ColumnProfile,
  ColumnMapping,
  RowFeatures,
  StructuralClassification,
  PredictionSource,
  TagPrediction,
  TermCorrection,
  AnalysisNode,
  AnalysisTreeResult,
  SheetType,
  SheetAnalysis,
  WorkbookAnalysis,
  CorrectionModelType,
  TagCorrection,
  CorrectedTermStat,
} from './types';
export type { WorkbookSource, GridSheet } from './services/workbook-source';
export type { RowFeatureInput } from './services/row-features';
export type { ClassificationRule } from './services/structural-classifier';
export type { TagPredictorView, TagPredictorOptions, BaselineTerms } from './services/tag-predictor';
export type { BuildTreeInput, TreeSummary } from './services/tree-builder';
export type { SaveCorrectionParams, HydrationResult } from './services/correction-learner';
export type { TagCorrectionStore, SaveCorrectionInput } from './stores/tag-correction-store';
export type { ParsedCsv } from './services/csv-workbook';
