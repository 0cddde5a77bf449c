/**
 * SheetFormula Engine - Reducer Builtins
 *
 * Each takes a single argument. Written as a comparison
 * (`countif(A1:A9 > 2)`) the left side is the source and the comparison
 * filters it; otherwise every non-blank cell of the argument is kept.
 */

import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import { ErrorCode, numberValue, booleanValue, errorValue, isScalar } from '../values/Value.js';
import type { Predicate } from '../values/Predicate.js';
import { FunctionValue } from '../values/FunctionValue.js';
import { isErrorValue } from './helpers.js';

/**
 * Non-blank cells of the source that satisfy the predicate
 */
function matching(predicate: Predicate, source: Value): ScalarValue[] | ErrorValue {
  let values: Iterable<ScalarValue>;
  if (source.type === 'array') {
    values = source.values();
  } else if (isScalar(source)) {
    if (source.type === 'error') return source;
    values = [source];
  } else {
    return errorValue(ErrorCode.value);
  }

  const matches: ScalarValue[] = [];
  for (const value of values) {
    if (value.type !== 'blank' && predicate(value)) {
      matches.push(value);
    }
  }
  return matches;
}

function numbersOf(values: ScalarValue[]): number[] {
  const numbers: number[] = [];
  for (const value of values) {
    if (value.type === 'number') numbers.push(value.value);
  }
  return numbers;
}

function countIf(predicate: Predicate, source: Value): Value {
  const matches = matching(predicate, source);
  if (isErrorValue(matches)) return matches;
  return numberValue(matches.length);
}

function sumIf(predicate: Predicate, source: Value): Value {
  const matches = matching(predicate, source);
  if (isErrorValue(matches)) return matches;
  return numberValue(numbersOf(matches).reduce((total, n) => total + n, 0));
}

function averageIf(predicate: Predicate, source: Value): Value {
  const matches = matching(predicate, source);
  if (isErrorValue(matches)) return matches;
  const numbers = numbersOf(matches);
  if (numbers.length === 0) return errorValue(ErrorCode.divideByZero);
  return numberValue(numbers.reduce((total, n) => total + n, 0) / numbers.length);
}

function any(predicate: Predicate, source: Value): Value {
  const matches = matching(predicate, source);
  if (isErrorValue(matches)) return matches;
  return booleanValue(matches.length > 0);
}

/**
 * True when no non-blank cell fails the predicate
 */
function all(predicate: Predicate, source: Value): Value {
  const kept = matching(predicate, source);
  if (isErrorValue(kept)) return kept;
  const present = matching(() => true, source);
  if (isErrorValue(present)) return present;
  return booleanValue(kept.length === present.length);
}

export function reducerFunctions(): FunctionValue[] {
  return [
    FunctionValue.reducer('countif', countIf),
    FunctionValue.reducer('sumif', sumIf),
    FunctionValue.reducer('averageif', averageIf),
    FunctionValue.reducer('any', any),
    FunctionValue.reducer('all', all),
  ];
}
