/**
 * SheetFormula Engine - Text Builtins
 *
 * Character positions are 1-based, as in spreadsheet applications.
 */

import type { Value } from '../values/Value.js';
import { ErrorCode, numberValue, textValue, errorValue, display } from '../values/Value.js';
import { FunctionValue } from '../values/FunctionValue.js';
import { flatten, numberArg, textArg, isErrorValue } from './helpers.js';

function concat(args: Value[]): Value {
  let result = '';
  for (const { value } of flatten(args)) {
    if (value.type === 'error') return value;
    result += display(value);
  }
  return textValue(result);
}

/**
 * Optional non-negative count argument, defaulting to 1
 */
function countArg(args: Value[], index: number): number | Value {
  if (args.length <= index) return 1;
  const count = numberArg(args[index]);
  if (isErrorValue(count)) return count;
  return count < 0 ? errorValue(ErrorCode.value) : Math.trunc(count);
}

function left(args: Value[]): Value {
  const text = textArg(args[0]);
  if (isErrorValue(text)) return text;
  const count = countArg(args, 1);
  if (typeof count !== 'number') return count;
  return textValue(text.slice(0, count));
}

function right(args: Value[]): Value {
  const text = textArg(args[0]);
  if (isErrorValue(text)) return text;
  const count = countArg(args, 1);
  if (typeof count !== 'number') return count;
  return textValue(count === 0 ? '' : text.slice(-count));
}

/**
 * mid(text, start, count) and substr(text, start[, count]); a missing count
 * takes the rest of the text
 */
function slice(args: Value[]): Value {
  const text = textArg(args[0]);
  if (isErrorValue(text)) return text;
  const start = numberArg(args[1]);
  if (isErrorValue(start)) return start;
  if (start < 1) return errorValue(ErrorCode.value);

  const from = Math.trunc(start) - 1;
  if (args.length < 3) {
    return textValue(text.slice(from));
  }

  const count = numberArg(args[2]);
  if (isErrorValue(count)) return count;
  if (count < 0) return errorValue(ErrorCode.value);
  return textValue(text.slice(from, from + Math.trunc(count)));
}

function len(args: Value[]): Value {
  const text = textArg(args[0]);
  if (isErrorValue(text)) return text;
  return numberValue(text.length);
}

function mapText(fn: (text: string) => string) {
  return (args: Value[]): Value => {
    const text = textArg(args[0]);
    if (isErrorValue(text)) return text;
    return textValue(fn(text));
  };
}

/**
 * replace(text, start, count, replacement)
 */
function replace(args: Value[]): Value {
  const text = textArg(args[0]);
  if (isErrorValue(text)) return text;
  const start = numberArg(args[1]);
  if (isErrorValue(start)) return start;
  const count = numberArg(args[2]);
  if (isErrorValue(count)) return count;
  const replacement = textArg(args[3]);
  if (isErrorValue(replacement)) return replacement;
  if (start < 1 || count < 0) return errorValue(ErrorCode.value);

  const from = Math.trunc(start) - 1;
  return textValue(text.slice(0, from) + replacement + text.slice(from + Math.trunc(count)));
}

export function textFunctions(): FunctionValue[] {
  return [
    FunctionValue.direct('concat', concat),
    FunctionValue.direct('left', left, { minArgs: 1, maxArgs: 2 }),
    FunctionValue.direct('right', right, { minArgs: 1, maxArgs: 2 }),
    FunctionValue.direct('mid', slice, { minArgs: 3, maxArgs: 3 }),
    FunctionValue.direct('substr', slice, { minArgs: 2, maxArgs: 3 }),
    FunctionValue.direct('len', len, { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('upper', mapText((text) => text.toUpperCase()), { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('lower', mapText((text) => text.toLowerCase()), { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('replace', replace, { minArgs: 4, maxArgs: 4 }),
  ];
}
