/**
 * SheetFormula Engine - Builtin Helpers
 */

import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import { ErrorCode, errorValue, isScalar } from '../values/Value.js';
import { toNumber, toText, toBool } from '../values/Coercion.js';

/**
 * A scalar argument together with where it came from. Range elements are
 * treated more leniently than scalars passed directly.
 */
export interface FlatItem {
  value: ScalarValue;
  fromArray: boolean;
}

export function flatten(args: readonly Value[]): FlatItem[] {
  const items: FlatItem[] = [];
  for (const arg of args) {
    if (arg.type === 'array') {
      for (const value of arg.values()) {
        items.push({ value, fromArray: true });
      }
    } else if (isScalar(arg)) {
      items.push({ value: arg, fromArray: false });
    } else {
      items.push({ value: errorValue(ErrorCode.value), fromArray: false });
    }
  }
  return items;
}

/**
 * Numbers of the arguments. Direct scalars are coerced; range elements count
 * only when they are numbers. The first error wins.
 */
export function collectNumbers(args: readonly Value[]): number[] | ErrorValue {
  const numbers: number[] = [];
  for (const { value, fromArray } of flatten(args)) {
    if (value.type === 'error') {
      return value;
    }
    if (fromArray) {
      if (value.type === 'number') numbers.push(value.value);
      continue;
    }
    const coerced = toNumber(value);
    if (coerced.type === 'error') {
      return errorValue(ErrorCode.value);
    }
    numbers.push(coerced.value);
  }
  return numbers;
}

/**
 * Booleans of the arguments; blanks and text inside ranges are skipped
 */
export function collectBooleans(args: readonly Value[]): boolean[] | ErrorValue {
  const flags: boolean[] = [];
  for (const { value, fromArray } of flatten(args)) {
    if (value.type === 'error') {
      return value;
    }
    if (fromArray && (value.type === 'blank' || value.type === 'text')) {
      continue;
    }
    const coerced = toBool(value);
    if (coerced.type === 'error') {
      return coerced;
    }
    flags.push(coerced.value);
  }
  return flags;
}

export function numberArg(value: Value): number | ErrorValue {
  const coerced = toNumber(value);
  if (coerced.type === 'error') {
    return coerced.code === ErrorCode.na ? errorValue(ErrorCode.value) : coerced;
  }
  return coerced.value;
}

export function textArg(value: Value): string | ErrorValue {
  const coerced = toText(value);
  return coerced.type === 'error' ? coerced : coerced.value;
}

/**
 * A scalar reading of an argument: the value itself, or the only element of
 * a 1x1 array
 */
export function scalarArg(value: Value): ScalarValue | null {
  if (isScalar(value)) {
    return value;
  }
  if (value.type === 'array') {
    const { rows, columns } = value.dimension;
    return rows === 1 && columns === 1 ? value.at(0, 0) : null;
  }
  return null;
}

export function isErrorValue<T>(value: T | ErrorValue): value is ErrorValue {
  return typeof value === 'object' && value !== null && 'type' in value && value.type === 'error';
}
