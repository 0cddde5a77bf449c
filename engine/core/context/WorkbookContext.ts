/**
 * SheetFormula Engine - Workbook Context
 *
 * Routes references to the named sheet, or to the active sheet for
 * unqualified ones. An unknown sheet reads as #REF!.
 */

import type { Position } from '../types/index.js';
import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import { ErrorCode, errorValue } from '../values/Value.js';
import type { ArrayValue } from '../values/ArrayValue.js';
import type { Workbook } from '../data/View.js';
import type { Context } from './Context.js';
import { SheetContext } from './SheetContext.js';
import { UndefinedIdentifierError } from '../errors/index.js';

export class WorkbookContext implements Context {
  private readonly workbook: Workbook;
  private readonly parent: Context | null;

  constructor(workbook: Workbook, parent?: Context) {
    this.workbook = workbook;
    this.parent = parent ?? null;
  }

  resolve(name: string): Value {
    if (this.parent === null) {
      throw new UndefinedIdentifierError(name);
    }
    return this.parent.resolve(name);
  }

  at(position: Position): ScalarValue {
    const sheet = this.sheetFor(position);
    if (sheet === null) {
      return errorValue(ErrorCode.ref, `unknown sheet ${position.sheet ?? ''}`);
    }
    return sheet.at(position);
  }

  range(start: Position, end: Position): ArrayValue | ErrorValue {
    const sheet = this.sheetFor(start);
    if (sheet === null) {
      return errorValue(ErrorCode.ref, `unknown sheet ${start.sheet ?? ''}`);
    }
    return sheet.range(start, end);
  }

  private sheetFor(position: Position): SheetContext | null {
    const view = position.sheet ? this.workbook.sheet(position.sheet) : this.workbook.activeSheet();
    if (view === null) {
      return null;
    }
    return new SheetContext(view, this.parent ?? undefined);
  }
}
