/**
 * SheetFormula Engine - Math Builtins
 */

import type { Value } from '../values/Value.js';
import { ErrorCode, numberValue, dateValue, errorValue } from '../values/Value.js';
import { FunctionValue } from '../values/FunctionValue.js';
import { collectNumbers, flatten, numberArg, isErrorValue } from './helpers.js';

function finite(result: number): Value {
  return Number.isFinite(result) ? numberValue(result) : errorValue(ErrorCode.num);
}

function sum(args: Value[]): Value {
  const numbers = collectNumbers(args);
  if (isErrorValue(numbers)) return numbers;
  return finite(numbers.reduce((total, n) => total + n, 0));
}

function average(args: Value[]): Value {
  const numbers = collectNumbers(args);
  if (isErrorValue(numbers)) return numbers;
  if (numbers.length === 0) return errorValue(ErrorCode.divideByZero);
  return finite(numbers.reduce((total, n) => total + n, 0) / numbers.length);
}

function extreme(pick: (a: number, b: number) => number) {
  return (args: Value[]): Value => {
    const numbers = collectNumbers(args);
    if (isErrorValue(numbers)) return numbers;
    if (numbers.length === 0) return numberValue(0);
    return numberValue(numbers.reduce((a, b) => pick(a, b)));
  };
}

/**
 * Numbers and dates among the arguments; errors are not counted
 */
function count(args: Value[]): Value {
  let total = 0;
  for (const { value } of flatten(args)) {
    if (value.type === 'number' || value.type === 'date') total++;
  }
  return numberValue(total);
}

type Rounding = 'nearest' | 'down' | 'up';

function roundTo(value: number, digits: number, mode: Rounding): number {
  const places = Math.trunc(digits);
  const factor = Math.pow(10, Math.abs(places));
  const magnitude = places >= 0 ? Math.abs(value) * factor : Math.abs(value) / factor;
  // strip binary noise such as 1.005 * 100 = 100.49999999999999
  const scaled = Number(magnitude.toPrecision(15));
  const rounded = mode === 'nearest' ? Math.round(scaled) : mode === 'down' ? Math.floor(scaled) : Math.ceil(scaled);
  const result = places >= 0 ? rounded / factor : rounded * factor;
  return Math.sign(value) * result;
}

function rounder(mode: Rounding) {
  return (args: Value[]): Value => {
    const value = numberArg(args[0]);
    if (isErrorValue(value)) return value;
    const digits = args.length > 1 ? numberArg(args[1]) : 0;
    if (isErrorValue(digits)) return digits;
    return finite(roundTo(value, digits, mode));
  };
}

function sqrt(args: Value[]): Value {
  const value = numberArg(args[0]);
  if (isErrorValue(value)) return value;
  if (value < 0) return errorValue(ErrorCode.num);
  return numberValue(Math.sqrt(value));
}

function abs(args: Value[]): Value {
  const value = numberArg(args[0]);
  if (isErrorValue(value)) return value;
  return numberValue(Math.abs(value));
}

export function mathFunctions(random: () => number, clock: () => number): FunctionValue[] {
  return [
    FunctionValue.direct('sum', sum),
    FunctionValue.direct('avg', average, { minArgs: 1 }),
    FunctionValue.direct('average', average, { minArgs: 1 }),
    FunctionValue.direct('min', extreme(Math.min)),
    FunctionValue.direct('max', extreme(Math.max)),
    FunctionValue.direct('count', count),
    FunctionValue.direct('round', rounder('nearest'), { minArgs: 1, maxArgs: 2 }),
    FunctionValue.direct('rounddown', rounder('down'), { minArgs: 1, maxArgs: 2 }),
    FunctionValue.direct('roundup', rounder('up'), { minArgs: 1, maxArgs: 2 }),
    FunctionValue.direct('sqrt', sqrt, { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('abs', abs, { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('rand', () => numberValue(random()), { maxArgs: 0, volatile: true }),
    FunctionValue.direct('now', () => dateValue(clock()), { maxArgs: 0, volatile: true }),
  ];
}
