/**
 * SheetFormula Engine - Environment
 *
 * Name bindings (constants, functions) with lexical parent lookup. An
 * environment serves no cells.
 */

import type { Position } from '../types/index.js';
import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import type { ArrayValue } from '../values/ArrayValue.js';
import type { Context } from './Context.js';
import { UndefinedIdentifierError, NotAvailableError } from '../errors/index.js';

export class Environment implements Context {
  private readonly bindings: Map<string, Value> = new Map();
  private readonly parent: Context | null;

  constructor(parent?: Context) {
    this.parent = parent ?? null;
  }

  /**
   * Bind a name, replacing an earlier local binding. Names are case-sensitive.
   */
  define(name: string, value: Value): this {
    this.bindings.set(name, value);
    return this;
  }

  /** Whether the name is bound locally (parents not consulted) */
  has(name: string): boolean {
    return this.bindings.has(name);
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  resolve(name: string): Value {
    const value = this.bindings.get(name);
    if (value !== undefined) {
      return value;
    }
    if (this.parent !== null) {
      return this.parent.resolve(name);
    }
    throw new UndefinedIdentifierError(name);
  }

  at(_position: Position): ScalarValue {
    throw new NotAvailableError('cell access');
  }

  range(_start: Position, _end: Position): ArrayValue | ErrorValue {
    throw new NotAvailableError('range access');
  }
}
