/**
 * Read-only view of a spreadsheet: ordered rows of cell text per sheet, plus
 * per-cell formula text and style identifiers.
 */

import { SheetReadError, parseCellRef } from '@tallyplan/shared';

export interface WorkbookSource {
  sheetNames(): string[];
  /** Rows in sheet order; each row holds cell text left to right. Throws SheetReadError. */
  getRows(sheetName: string): string[][];
  /** Formula text without the leading "=", or '' when the cell holds a literal. */
  getCellFormula(sheetName: string, cellRef: string): string;
  /** 0 for unstyled cells; any positive value marks an emphasized cell. */
  getCellStyle(sheetName: string, cellRef: string): number;
}

export interface GridSheet {
  rows: string[][];
  /** Formulas keyed by A1 reference */
  formulas?: Record<string, string>;
  /** Style identifiers keyed by A1 reference */
  styles?: Record<string, number>;
}

/**
 * In-memory workbook built from plain grids. Backs CSV uploads and pasted
 * tables, which carry no formulas or styles unless the caller supplies them.
 */
export class GridWorkbookSource implements WorkbookSource {
  private readonly sheets: Map<string, GridSheet>;

  constructor(sheets: Record<string, GridSheet>) {
    this.sheets = new Map(Object.entries(sheets));
  }

  sheetNames(): string[] {
    return [...this.sheets.keys()];
  }

  getRows(sheetName: string): string[][] {
    return this.requireSheet(sheetName).rows;
  }

  getCellFormula(sheetName: string, cellRef: string): string {
    const sheet = this.requireSheet(sheetName);
    return sheet.formulas?.[normalizeRef(cellRef)] ?? '';
  }

  getCellStyle(sheetName: string, cellRef: string): number {
    const sheet = this.requireSheet(sheetName);
    return sheet.styles?.[normalizeRef(cellRef)] ?? 0;
  }

  private requireSheet(sheetName: string): GridSheet {
    const sheet = this.sheets.get(sheetName);
    if (!sheet) {
      throw new SheetReadError(sheetName, 'sheet does not exist');
    }
    return sheet;
  }
}

function normalizeRef(cellRef: string): string {
  return parseCellRef(cellRef) ? cellRef.trim().toUpperCase() : cellRef;
}
