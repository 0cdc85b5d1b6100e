/**
 * SheetJS-backed workbook source for .xlsx / .xls uploads.
 */

import { Buffer } from 'node:buffer';
import * as XLSX from 'xlsx';
import { SheetReadError } from '@tallyplan/shared';
import type { WorkbookSource } from './workbook-source';

interface CellLike {
  f?: unknown;
  s?: unknown;
}

function isCellLike(value: unknown): value is CellLike {
  return typeof value === 'object' && value !== null && 't' in value;
}

/**
 * SheetJS community builds only parse fill styles; builds that parse fonts
 * also expose `font.bold`. Either counts as an emphasized cell.
 */
function styleIdOf(style: unknown): number {
  if (typeof style !== 'object' || style === null) return 0;
  if ('font' in style && typeof style.font === 'object' && style.font !== null) {
    if ('bold' in style.font && style.font.bold === true) return 2;
  }
  if ('patternType' in style && typeof style.patternType === 'string' && style.patternType !== 'none') {
    return 1;
  }
  return 0;
}

export class XlsxWorkbookSource implements WorkbookSource {
  private readonly rowCache = new Map<string, string[][]>();

  constructor(private readonly workbook: XLSX.WorkBook) {}

  static fromBuffer(data: Uint8Array | ArrayBuffer, fileName = 'workbook'): XlsxWorkbookSource {
    const buffer = Buffer.isBuffer(data)
      ? data
      : Buffer.from(data instanceof ArrayBuffer ? new Uint8Array(data) : data);
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(buffer, { type: 'buffer', cellFormula: true, cellStyles: true });
    } catch (err) {
      throw new SheetReadError(fileName, 'file is not a readable spreadsheet', err);
    }
    return new XlsxWorkbookSource(workbook);
  }

  sheetNames(): string[] {
    return [...this.workbook.SheetNames];
  }

  getRows(sheetName: string): string[][] {
    const cached = this.rowCache.get(sheetName);
    if (cached) return cached;

    const sheet = this.requireSheet(sheetName);
    const ref = sheet['!ref'];
    if (!ref) {
      this.rowCache.set(sheetName, []);
      return [];
    }

    // Anchor the range at A1 so row N of the result is sheet row N
    const range = XLSX.utils.decode_range(ref);
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      raw: false,
      defval: '',
      blankrows: true,
      range: { s: { r: 0, c: 0 }, e: range.e },
    });
    const text = rows.map((row) => row.map((cell) => (cell == null ? '' : String(cell))));
    this.rowCache.set(sheetName, text);
    return text;
  }

  getCellFormula(sheetName: string, cellRef: string): string {
    const cell = this.cell(sheetName, cellRef);
    return cell && typeof cell.f === 'string' ? cell.f : '';
  }

  getCellStyle(sheetName: string, cellRef: string): number {
    const cell = this.cell(sheetName, cellRef);
    return cell ? styleIdOf(cell.s) : 0;
  }

  private cell(sheetName: string, cellRef: string): CellLike | null {
    const sheet = this.requireSheet(sheetName);
    const value: unknown = sheet[cellRef.toUpperCase()];
    return isCellLike(value) ? value : null;
  }

  private requireSheet(sheetName: string): XLSX.WorkSheet {
    const sheet = this.workbook.Sheets[sheetName];
    if (!sheet) {
      throw new SheetReadError(sheetName, 'sheet does not exist');
    }
    return sheet;
  }
}
