/**
 * SheetFormula Engine - Object Values
 *
 * Named, ordered properties describing a sheet, a workbook or any other
 * introspectable thing. Properties are read with the `get` builtin.
 */

import type { Value } from './Value.js';
import { PropertyError } from '../errors/index.js';

export class ObjectValue {
  readonly type = 'object' as const;

  /** What the object describes ("view", "workbook", ...) */
  readonly kind: string;

  private readonly fields: Map<string, Value>;

  constructor(kind: string, fields: Iterable<[string, Value]> = []) {
    this.kind = kind;
    this.fields = new Map(fields);
  }

  get typeName(): string {
    return this.kind;
  }

  /**
   * @throws PropertyError for unknown properties
   */
  get(property: string): Value {
    const value = this.fields.get(property);
    if (value === undefined) {
      throw new PropertyError(property);
    }
    return value;
  }

  has(property: string): boolean {
    return this.fields.has(property);
  }

  keys(): string[] {
    return [...this.fields.keys()];
  }

  toString(): string {
    return `<${this.kind}>`;
  }
}
