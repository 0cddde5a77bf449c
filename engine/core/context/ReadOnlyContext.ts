/**
 * SheetFormula Engine - Read-Only Context
 *
 * Forwards lookups to the wrapped context and hides its write capability, so
 * a scope stack never writes through it.
 */

import type { Position } from '../types/index.js';
import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import type { ArrayValue } from '../values/ArrayValue.js';
import type { Context } from './Context.js';

export class ReadOnlyContext implements Context {
  private readonly inner: Context;

  constructor(inner: Context) {
    this.inner = inner;
  }

  resolve(name: string): Value {
    return this.inner.resolve(name);
  }

  at(position: Position): ScalarValue {
    return this.inner.at(position);
  }

  range(start: Position, end: Position): ArrayValue | ErrorValue {
    return this.inner.range(start, end);
  }
}
