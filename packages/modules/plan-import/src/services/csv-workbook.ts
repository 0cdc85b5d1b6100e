/**
 * CSV parser for budget uploads.
 * Handles BOM, quoted fields, flexible delimiters. Blank lines are kept as
 * empty rows so row numbers line up with what the user sees in their editor.
 */

import { ValidationError } from '@tallyplan/shared';
import { GridWorkbookSource } from './workbook-source';

const MAX_FILE_SIZE = 5 * 1024 * 1024; // 5MB
const MAX_ROWS = 10_000;

export interface ParsedCsv {
  rows: string[][];
  delimiter: string;
}

export function parseBudgetCsv(raw: string): ParsedCsv {
  if (raw.length > MAX_FILE_SIZE) {
    throw new ValidationError(`File too large (max ${MAX_FILE_SIZE / 1024 / 1024}MB)`);
  }

  let text = raw;
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }

  const delimiter = detectDelimiter(text);
  const lines = splitLines(text);
  if (lines.length > MAX_ROWS) {
    throw new ValidationError(`Too many rows (max ${MAX_ROWS.toLocaleString('en-US')})`);
  }

  const rows = lines.map((line) => (line.trim() === '' ? [] : parseLine(line, delimiter)));
  return { rows, delimiter };
}

/** Wraps a CSV file as a single-sheet workbook named after the file. */
export function parseCsvWorkbook(raw: string, sheetName = 'Sheet1'): GridWorkbookSource {
  const { rows } = parseBudgetCsv(raw);
  return new GridWorkbookSource({ [sheetName]: { rows } });
}

export function detectDelimiter(text: string): string {
  const firstLine = text.split(/\r?\n/).find((l) => l.trim() !== '') ?? '';
  const tabCount = (firstLine.match(/\t/g) ?? []).length;
  const commaCount = (firstLine.match(/,/g) ?? []).length;
  const semiCount = (firstLine.match(/;/g) ?? []).length;
  const pipeCount = (firstLine.match(/\|/g) ?? []).length;

  const max = Math.max(tabCount, commaCount, semiCount, pipeCount);
  if (max === 0) return ',';
  if (tabCount === max) return '\t';
  if (semiCount === max) return ';';
  if (pipeCount === max) return '|';
  return ',';
}

function splitLines(text: string): string[] {
  const lines: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i]!;
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if ((ch === '\n' || ch === '\r') && !inQuotes) {
      lines.push(current);
      current = '';
      // Skip \r\n pair
      if (ch === '\r' && text[i + 1] === '\n') i++;
    } else {
      current += ch;
    }
  }
  if (current !== '') lines.push(current);
  return lines;
}

function parseLine(line: string, delimiter: string): string[] {
  const cells: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]!;
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (ch === delimiter && !inQuotes) {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  return cells;
}
