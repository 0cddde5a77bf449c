/**
 * SheetFormula Engine - Resolution Context
 *
 * What the evaluator may ask of its surroundings. Implementations layer on
 * top of each other through an optional parent.
 */

import type { Position } from '../types/index.js';
import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import type { ArrayValue } from '../values/ArrayValue.js';

export interface Context {
  /**
   * Value bound to a name
   * @throws UndefinedIdentifierError
   */
  resolve(name: string): Value;

  /**
   * Value of a single cell; Blank for an empty one
   * @throws NotAvailableError when no layer serves cells
   */
  at(position: Position): ScalarValue;

  /**
   * Values of a rectangular block, normalized so start <= end
   * @throws NotAvailableError when no layer serves cells
   */
  range(start: Position, end: Position): ArrayValue | ErrorValue;
}
