/**
 * SheetFormula Engine - Sheet Context
 *
 * Serves cells of one view. References qualified with another sheet name go
 * to the parent; names always go to the parent.
 */

import type { Position } from '../types/index.js';
import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import { BLANK, ErrorCode, errorValue } from '../values/Value.js';
import { ArrayValue } from '../values/ArrayValue.js';
import { normalizeRange } from '../address/AddressCodec.js';
import type { AddressableView, MutableView } from '../data/View.js';
import type { Context } from './Context.js';
import { UndefinedIdentifierError, NotAvailableError } from '../errors/index.js';

/**
 * A context that accepts cell writes
 */
export interface WritableContext extends Context {
  readonly writable: true;
  setValue(position: Position, value: ScalarValue): void;
}

export function isWritable(context: Context): context is WritableContext {
  return 'writable' in context && context.writable === true;
}

function isValidPosition(pos: Position): boolean {
  return pos.row >= 1 && pos.column >= 1;
}

export class SheetContext implements Context {
  protected readonly view: AddressableView;
  private readonly parent: Context | null;

  constructor(view: AddressableView, parent?: Context) {
    this.view = view;
    this.parent = parent ?? null;
  }

  get name(): string {
    return this.view.name;
  }

  resolve(name: string): Value {
    if (this.parent === null) {
      throw new UndefinedIdentifierError(name);
    }
    return this.parent.resolve(name);
  }

  at(position: Position): ScalarValue {
    if (!this.isLocal(position)) {
      return this.requireParent(position).at(position);
    }
    if (!isValidPosition(position)) {
      return errorValue(ErrorCode.ref);
    }
    return this.view.cell(position)?.value ?? BLANK;
  }

  range(start: Position, end: Position): ArrayValue | ErrorValue {
    if ((start.sheet ?? '') !== (end.sheet ?? '') && end.sheet !== undefined) {
      return errorValue(ErrorCode.ref, 'range spans several sheets');
    }
    if (!this.isLocal(start)) {
      return this.requireParent(start).range(start, end);
    }
    if (!isValidPosition(start) || !isValidPosition(end)) {
      return errorValue(ErrorCode.ref);
    }

    const normalized = normalizeRange({ start, end });
    const data: ScalarValue[][] = [];
    for (let row = normalized.start.row; row <= normalized.end.row; row++) {
      const line: ScalarValue[] = [];
      for (let column = normalized.start.column; column <= normalized.end.column; column++) {
        line.push(this.view.cell({ ...normalized.start, row, column })?.value ?? BLANK);
      }
      data.push(line);
    }
    return new ArrayValue(data);
  }

  private isLocal(position: Position): boolean {
    return position.sheet === undefined || position.sheet === '' || position.sheet === this.view.name;
  }

  private requireParent(position: Position): Context {
    if (this.parent === null) {
      throw new NotAvailableError(`sheet ${position.sheet ?? ''}`);
    }
    return this.parent;
  }
}

/**
 * Sheet context over a writable view
 */
export class WritableSheetContext extends SheetContext implements WritableContext {
  readonly writable = true as const;

  private readonly target: MutableView;

  constructor(view: MutableView, parent?: Context) {
    super(view, parent);
    this.target = view;
  }

  setValue(position: Position, value: ScalarValue): void {
    this.target.setValue(position, value);
  }
}
