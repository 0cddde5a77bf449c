/**
 * SheetFormula Engine - ArrayValue Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ArrayValue } from './ArrayValue.js';
import type { ScalarValue } from './Value.js';
import { BLANK, numberValue, textValue, display } from './Value.js';
import { toNumber } from './Coercion.js';
import { comparisonPredicate, truePredicate } from './Predicate.js';

function grid(rows: number[][]): ArrayValue {
  return new ArrayValue(rows.map((row) => row.map(numberValue)));
}

function add(left: ScalarValue, right: ScalarValue): ScalarValue {
  const a = toNumber(left);
  const b = toNumber(right);
  if (a.type === 'error') return a;
  if (b.type === 'error') return b;
  return numberValue(a.value + b.value);
}

describe('ArrayValue', () => {
  it('should pad ragged rows with blanks', () => {
    const arr = new ArrayValue([[numberValue(1)], [numberValue(2), numberValue(3)]]);
    expect(arr.dimension).toEqual({ rows: 2, columns: 2 });
    expect(arr.at(0, 1)).toBe(BLANK);
  });

  it('should read and write elements', () => {
    const arr = ArrayValue.filled(2, 2);
    arr.setAt(1, 0, textValue('x'));
    expect(arr.at(1, 0)).toEqual(textValue('x'));
    expect(arr.at(5, 0)).toMatchObject({ code: '#REF!' });
    expect(() => arr.setAt(2, 0, BLANK)).toThrow(RangeError);
  });

  it('should not share storage with its input', () => {
    const rows = [[numberValue(1)]];
    const arr = new ArrayValue(rows);
    arr.setAt(0, 0, numberValue(9));
    expect(rows[0][0]).toEqual(numberValue(1));
    arr.rows()[0][0] = numberValue(5);
    expect(arr.at(0, 0)).toEqual(numberValue(9));
  });

  it('should transform in place with apply', () => {
    const arr = grid([[1, 2], [3, 4]]);
    const result = arr.apply((v) => add(v, numberValue(10)));
    expect(result).toBe(arr);
    expect(arr.toString()).toBe('{11, 12; 13, 14}');
  });

  it('should stop apply at the first exception', () => {
    const arr = grid([[1, 2, 3]]);
    let calls = 0;
    expect(() =>
      arr.apply((v) => {
        calls++;
        if (calls === 2) throw new Error('stop');
        return add(v, numberValue(1));
      })
    ).toThrow('stop');
    expect([...arr.values()].map(display)).toEqual(['2', '2', '3']);
  });

  it('should broadcast with applyWith', () => {
    const column = grid([[1], [2]]);
    const row = grid([[10, 20, 30]]);
    const sum = column.applyWith(row, add);
    expect(sum.dimension).toEqual({ rows: 2, columns: 3 });
    expect(sum.toString()).toBe('{11, 21, 31; 12, 22, 32}');
  });

  it('should broadcast a 1x1 operand across the grid', () => {
    const sum = grid([[1, 2], [3, 4]]).applyWith(ArrayValue.of(numberValue(1)), add);
    expect(sum.toString()).toBe('{2, 3; 4, 5}');
  });

  it('should repeat the smaller operand modulo its size', () => {
    const sum = grid([[1, 2, 3, 4]]).applyWith(grid([[10, 20]]), add);
    expect(sum.toString()).toBe('{11, 22, 13, 24}');
  });

  it('should describe itself', () => {
    expect(ArrayValue.fromList([BLANK, BLANK]).typeName).toBe('array(1, 2)');
    expect(new ArrayValue([]).dimension).toEqual({ rows: 0, columns: 0 });
  });
});

describe('Predicate', () => {
  it('should test the cell against the operand', () => {
    const greaterThanTwo = comparisonPredicate('>', numberValue(2));
    expect(greaterThanTwo(numberValue(3))).toBe(true);
    expect(greaterThanTwo(numberValue(2))).toBe(false);
    expect(greaterThanTwo(BLANK)).toBe(false);
  });

  it('should not match cells of another variant', () => {
    const isFoo = comparisonPredicate('=', textValue('foo'));
    expect(isFoo(textValue('foo'))).toBe(true);
    expect(isFoo(numberValue(1))).toBe(false);
  });

  it('should accept everything with the true predicate', () => {
    expect(truePredicate(BLANK)).toBe(true);
  });
});
