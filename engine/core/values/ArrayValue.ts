/**
 * SheetFormula Engine - Array Values
 *
 * Rectangular grid of scalars produced by ranges and by elementwise
 * operators. Indexes are 0-based (row, column).
 */

import type { Dimension } from '../types/index.js';
import type { ScalarValue } from './Value.js';
import { BLANK, ErrorCode, errorValue, display } from './Value.js';

export class ArrayValue {
  readonly type = 'array' as const;

  private readonly data: ScalarValue[][];
  private readonly columns: number;

  constructor(data: ScalarValue[][]) {
    this.columns = data.reduce((max, row) => Math.max(max, row.length), 0);
    this.data = data.map((row) => {
      const copy = row.slice();
      while (copy.length < this.columns) copy.push(BLANK);
      return copy;
    });
  }

  static filled(rows: number, columns: number, value: ScalarValue = BLANK): ArrayValue {
    const data: ScalarValue[][] = [];
    for (let r = 0; r < rows; r++) {
      data.push(new Array<ScalarValue>(columns).fill(value));
    }
    return new ArrayValue(data);
  }

  static of(value: ScalarValue): ArrayValue {
    return new ArrayValue([[value]]);
  }

  /** A single row */
  static fromList(values: readonly ScalarValue[]): ArrayValue {
    return new ArrayValue([values.slice()]);
  }

  get dimension(): Dimension {
    return { rows: this.data.length, columns: this.data.length > 0 ? this.columns : 0 };
  }

  get typeName(): string {
    const { rows, columns } = this.dimension;
    return `array(${rows}, ${columns})`;
  }

  /**
   * Element at (row, column); #REF! outside the grid
   */
  at(row: number, column: number): ScalarValue {
    const line = this.data[row];
    if (line === undefined || column < 0 || column >= line.length) {
      return errorValue(ErrorCode.ref);
    }
    return line[column];
  }

  /**
   * @throws RangeError outside the grid
   */
  setAt(row: number, column: number, value: ScalarValue): void {
    const line = this.data[row];
    if (line === undefined || column < 0 || column >= line.length) {
      throw new RangeError(`array index (${row}, ${column}) out of bounds for ${this.typeName}`);
    }
    line[column] = value;
  }

  /**
   * Transform every element in place. An exception from `fn` stops the walk
   * and leaves the already visited elements transformed.
   */
  apply(fn: (value: ScalarValue, row: number, column: number) => ScalarValue): this {
    for (let r = 0; r < this.data.length; r++) {
      const line = this.data[r];
      for (let c = 0; c < line.length; c++) {
        line[c] = fn(line[c], r, c);
      }
    }
    return this;
  }

  /**
   * Combine with another array into a new one sized to the larger of each
   * axis. The smaller operand repeats (index modulo its size).
   */
  applyWith(other: ArrayValue, fn: (left: ScalarValue, right: ScalarValue) => ScalarValue): ArrayValue {
    const a = this.dimension;
    const b = other.dimension;
    if (a.rows === 0 || a.columns === 0 || b.rows === 0 || b.columns === 0) {
      return new ArrayValue([]);
    }

    const rows = Math.max(a.rows, b.rows);
    const columns = Math.max(a.columns, b.columns);
    const data: ScalarValue[][] = [];

    for (let r = 0; r < rows; r++) {
      const line: ScalarValue[] = [];
      for (let c = 0; c < columns; c++) {
        line.push(fn(this.at(r % a.rows, c % a.columns), other.at(r % b.rows, c % b.columns)));
      }
      data.push(line);
    }

    return new ArrayValue(data);
  }

  /**
   * Row-major walk over every element
   */
  *values(): Generator<ScalarValue, void, undefined> {
    for (const line of this.data) {
      yield* line;
    }
  }

  rows(): ScalarValue[][] {
    return this.data.map((line) => line.slice());
  }

  toString(): string {
    const body = this.data.map((line) => line.map(display).join(', ')).join('; ');
    return `{${body}}`;
  }
}
