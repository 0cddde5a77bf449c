/**
 * SheetFormula Engine - In-Memory Sheet
 *
 * Sparse cell storage: only non-empty cells are kept, keyed by "row_col".
 *
 * Key features:
 * - O(1) cell access via Map
 * - Row index for row-major iteration without scanning empty rows
 * - Incrementally tracked used range, recomputed lazily after deletions
 */

import type { Position, CellRange, CellKey } from '../types/index.js';
import { cellKey, parseKey, position, MAX_ROWS, MAX_COLUMNS } from '../types/index.js';
import type { ScalarValue } from '../values/Value.js';
import { BLANK, display } from '../values/Value.js';
import { parseScalar } from '../values/Coercion.js';
import type { Cell, MutableView } from './View.js';
import { ReadOnlyError } from '../errors/index.js';

export interface MemorySheetOptions {
  /** Refuse `mutable()` */
  readOnly?: boolean;
}

export interface FormulaCell {
  position: Position;
  formula: string;
}

interface UsedArea {
  startRow: number;
  startColumn: number;
  endRow: number;
  endColumn: number;
}

function emptyArea(): UsedArea {
  return { startRow: 0, startColumn: 0, endRow: -1, endColumn: -1 };
}

export class MemorySheet implements MutableView {
  readonly name: string;

  private readonly readOnly: boolean;

  /** Main cell storage: Map<"row_col", Cell> */
  private cells: Map<CellKey, Cell> = new Map();

  /** Row index: Map<row, Set<column>> for row iteration */
  private rowIndex: Map<number, Set<number>> = new Map();

  /** Tracked bounds of the used area, endRow -1 when empty */
  private usedArea: UsedArea = emptyArea();

  /** Whether bounds need recalculation */
  private boundsDirty: boolean = false;

  constructor(name: string, options: MemorySheetOptions = {}) {
    this.name = name;
    this.readOnly = options.readOnly ?? false;
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  cell(pos: Position): Cell | null {
    return this.cells.get(cellKey(pos.row, pos.column)) ?? null;
  }

  hasCell(pos: Position): boolean {
    return this.cells.has(cellKey(pos.row, pos.column));
  }

  get cellCount(): number {
    return this.cells.size;
  }

  bounds(): CellRange {
    if (this.boundsDirty) {
      this.recalculateBounds();
    }
    const area = this.usedArea;
    if (area.endRow < 0) {
      return { start: position(0, 0), end: position(0, 0) };
    }
    return {
      start: position(area.startColumn, area.startRow),
      end: position(area.endColumn, area.endRow),
    };
  }

  /**
   * Values of the used range, one array per row, Blank for holes
   */
  *rows(): Generator<ScalarValue[], void, undefined> {
    const { start, end } = this.bounds();
    if (start.row === 0) return;

    for (let row = start.row; row <= end.row; row++) {
      const line = new Array<ScalarValue>(end.column - start.column + 1).fill(BLANK);
      const columns = this.rowIndex.get(row);
      if (columns) {
        for (const column of columns) {
          const stored = this.cells.get(cellKey(row, column));
          if (stored) {
            line[column - start.column] = stored.value;
          }
        }
      }
      yield line;
    }
  }

  /**
   * Every cell holding a formula, in no particular order
   */
  *formulaCells(): Generator<FormulaCell, void, undefined> {
    for (const [key, stored] of this.cells) {
      if (stored.formula === undefined) continue;
      const { row, column } = parseKey(key);
      yield { position: position(column, row, this.name), formula: stored.formula };
    }
  }

  mutable(): MemorySheet {
    if (this.readOnly) {
      throw new ReadOnlyError(this.name);
    }
    return this;
  }

  // ===========================================================================
  // Writing
  // ===========================================================================

  /**
   * Store a constant; Blank clears the cell
   */
  setValue(pos: Position, value: ScalarValue): void {
    if (value.type === 'blank') {
      this.clearCell(pos);
      return;
    }
    this.store(pos, { display: display(value), value });
  }

  /**
   * Store raw user input: `=...` becomes a formula, anything else is parsed
   * as a constant
   */
  setInput(pos: Position, text: string): void {
    if (text.startsWith('=')) {
      this.setFormula(pos, text);
      return;
    }
    this.setValue(pos, parseScalar(text));
  }

  setFormula(pos: Position, formula: string): void {
    const text = formula.startsWith('=') ? formula.slice(1) : formula;
    this.store(pos, { display: '', value: BLANK, formula: text });
  }

  setResult(pos: Position, value: ScalarValue): void {
    const existing = this.cell(pos);
    if (existing?.formula === undefined) {
      this.setValue(pos, value);
      return;
    }
    this.store(pos, { display: display(value), value, formula: existing.formula });
  }

  clearCell(pos: Position): void {
    const row = pos.row;
    const column = pos.column;
    const key = cellKey(row, column);

    if (!this.cells.has(key)) return;

    this.cells.delete(key);

    const rowColumns = this.rowIndex.get(row);
    if (rowColumns) {
      rowColumns.delete(column);
      if (rowColumns.size === 0) {
        this.rowIndex.delete(row);
      }
    }

    // Deleting at an edge may shrink the used range
    const area = this.usedArea;
    if (row === area.endRow || column === area.endColumn ||
        row === area.startRow || column === area.startColumn) {
      this.boundsDirty = true;
    }
  }

  /**
   * Clear every cell inside a range
   */
  clearRange(range: CellRange): void {
    for (let row = range.start.row; row <= range.end.row; row++) {
      const columns = this.rowIndex.get(row);
      if (!columns) continue;

      for (const column of [...columns]) {
        if (column >= range.start.column && column <= range.end.column) {
          this.clearCell(position(column, row));
        }
      }
    }
  }

  clear(): void {
    this.cells.clear();
    this.rowIndex.clear();
    this.usedArea = emptyArea();
    this.boundsDirty = false;
  }

  private store(pos: Position, stored: Cell): void {
    const { row, column } = pos;
    if (row < 1 || row > MAX_ROWS || column < 1 || column > MAX_COLUMNS) {
      throw new RangeError(`position (${row}, ${column}) is outside sheet ${this.name}`);
    }

    this.cells.set(cellKey(row, column), stored);

    let rowColumns = this.rowIndex.get(row);
    if (!rowColumns) {
      rowColumns = new Set();
      this.rowIndex.set(row, rowColumns);
    }
    rowColumns.add(column);

    // Quick update, not full recalc
    const area = this.usedArea;
    if (area.endRow === -1) {
      this.usedArea = { startRow: row, startColumn: column, endRow: row, endColumn: column };
      return;
    }
    if (area.endRow < row) area.endRow = row;
    if (area.endColumn < column) area.endColumn = column;
    if (area.startRow > row) area.startRow = row;
    if (area.startColumn > column) area.startColumn = column;
  }

  private recalculateBounds(): void {
    if (this.cells.size === 0) {
      this.usedArea = emptyArea();
      this.boundsDirty = false;
      return;
    }

    let minRow = MAX_ROWS + 1;
    let maxRow = -1;
    let minColumn = MAX_COLUMNS + 1;
    let maxColumn = -1;

    for (const key of this.cells.keys()) {
      const { row, column } = parseKey(key);
      if (row < minRow) minRow = row;
      if (row > maxRow) maxRow = row;
      if (column < minColumn) minColumn = column;
      if (column > maxColumn) maxColumn = column;
    }

    this.usedArea = {
      startRow: minRow,
      startColumn: minColumn,
      endRow: maxRow,
      endColumn: maxColumn,
    };
    this.boundsDirty = false;
  }
}
