/**
 * SheetFormula Engine - Addressable Views
 *
 * The storage boundary. Contexts read cells through these interfaces only;
 * MemorySheet and MemoryWorkbook are the in-process implementations.
 */

import type { Position, CellRange } from '../types/index.js';
import type { ScalarValue } from '../values/Value.js';

export interface Cell {
  /** Display string of the value */
  display: string;
  value: ScalarValue;
  /** Formula text without the leading `=` */
  formula?: string;
}

export interface AddressableView {
  readonly name: string;

  /** Stored cell, null when empty */
  cell(position: Position): Cell | null;

  /** Used range; (0,0)-(0,0) when the view holds nothing */
  bounds(): CellRange;

  /** Row-major values of the used range; every call starts over */
  rows(): Iterable<ScalarValue[]>;

  /**
   * Writable handle on the same data
   * @throws ReadOnlyError when the view is protected
   */
  mutable(): MutableView;
}

export interface MutableView extends AddressableView {
  /** Store a constant, replacing any formula */
  setValue(position: Position, value: ScalarValue): void;

  /** Store a formula; its value stays Blank until computed */
  setFormula(position: Position, formula: string): void;

  /** Store the computed value of a formula cell, keeping the formula */
  setResult(position: Position, value: ScalarValue): void;

  clearCell(position: Position): void;
}

export interface Workbook {
  sheetNames(): string[];
  sheet(name: string): AddressableView | null;
  activeSheet(): AddressableView;
}
