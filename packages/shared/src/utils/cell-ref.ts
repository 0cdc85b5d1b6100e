/**
 * A1-style cell reference helpers. Column indexes are 1-based (A = 1).
 */

const COLUMN_LETTERS = /^[A-Za-z]{1,3}$/;
const CELL_REF = /^([A-Za-z]{1,3})([1-9]\d*)$/;

export function isColumnLetter(value: string): boolean {
  return COLUMN_LETTERS.test(value);
}

export function columnLetterToIndex(letter: string): number {
  if (!isColumnLetter(letter)) {
    throw new RangeError(`Invalid column letter "${letter}"`);
  }
  let index = 0;
  for (const ch of letter.toUpperCase()) {
    index = index * 26 + (ch.charCodeAt(0) - 64);
  }
  return index;
}

export function columnIndexToLetter(index: number): string {
  if (!Number.isInteger(index) || index <= 0) return '';
  let remaining = index;
  let letters = '';
  while (remaining > 0) {
    remaining--;
    letters = String.fromCharCode(65 + (remaining % 26)) + letters;
    remaining = Math.floor(remaining / 26);
  }
  return letters;
}

export function toCellRef(columnIndex: number, row: number): string {
  return `${columnIndexToLetter(columnIndex)}${row}`;
}

export function parseCellRef(ref: string): { columnIndex: number; row: number } | null {
  const match = CELL_REF.exec(ref.trim());
  if (!match) return null;
  return {
    columnIndex: columnLetterToIndex(match[1]!),
    row: parseInt(match[2]!, 10),
  };
}
