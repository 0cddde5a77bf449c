/**
 * SheetFormula Engine - Core Type Definitions
 * Cell addressing shared by the lexer, parser, contexts and grid
 */

// ============================================================================
// Cell Reference Types
// ============================================================================

/**
 * A cell address. Columns and rows are 1-based; 0 means "unset".
 */
export interface Position {
  /** Sheet qualifier (`Sheet1` in `Sheet1!A1`), absent for local references */
  sheet?: string;
  /** Column index, A=1 ... Z=26, AA=27 */
  column: number;
  /** Row index */
  row: number;
  /** `$` before the column letters */
  absoluteColumn: boolean;
  /** `$` before the row digits */
  absoluteRow: boolean;
}

export interface CellRange {
  start: Position;
  end: Position;
}

export interface Dimension {
  rows: number;
  columns: number;
}

/**
 * Build a relative position, optionally on a named sheet
 */
export function position(column: number, row: number, sheet?: string): Position {
  const pos: Position = {
    column,
    row,
    absoluteColumn: false,
    absoluteRow: false,
  };
  if (sheet) {
    pos.sheet = sheet;
  }
  return pos;
}

/** Key format: "row_col" (sheet-local) */
export type CellKey = string;

export function cellKey(row: number, column: number): CellKey {
  return `${row}_${column}`;
}

export function parseKey(key: CellKey): { row: number; column: number } {
  const [row, column] = key.split('_').map(Number);
  return { row, column };
}

// ============================================================================
// Constants
// ============================================================================

/** `ZZZ`: the widest column the address codec accepts */
export const MAX_COLUMNS = 18_278;
export const MAX_ROWS = 1_048_576;
export const MAX_COLUMN_LETTERS = 3;
