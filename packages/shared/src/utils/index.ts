export { generateUlid, createIdFactory, isValidUlid } from './ids';
export type { IdFactory } from './ids';
export {
  isColumnLetter,
  columnLetterToIndex,
  columnIndexToLetter,
  toCellRef,
  parseCellRef,
} from './cell-ref';
export { parseNumericValue, isNumericText } from './numeric';
