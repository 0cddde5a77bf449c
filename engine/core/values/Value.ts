/**
 * SheetFormula Engine - Value Model
 *
 * Everything an expression can evaluate to. Scalars are small frozen records
 * built by the factories below; arrays, objects and functions are classes
 * (see ArrayValue.ts, ObjectValue.ts, FunctionValue.ts).
 *
 * In-language errors (#DIV/0!, #VALUE!, ...) are ordinary values and flow
 * through operators unchanged. Structural failures are thrown instead, see
 * errors/index.ts.
 */

import type { ArrayValue } from './ArrayValue.js';
import type { ObjectValue } from './ObjectValue.js';
import type { FunctionValue } from './FunctionValue.js';

// ============================================================================
// Variants
// ============================================================================

export const ErrorCode = {
  null: '#NULL!',
  divideByZero: '#DIV/0!',
  value: '#VALUE!',
  ref: '#REF!',
  name: '#NAME?',
  num: '#NUM!',
  na: '#N/A',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export const ERROR_CODES: readonly ErrorCode[] = Object.values(ErrorCode);

export interface BlankValue {
  readonly type: 'blank';
}

export interface NumberValue {
  readonly type: 'number';
  readonly value: number;
}

export interface TextValue {
  readonly type: 'text';
  readonly value: string;
}

export interface BooleanValue {
  readonly type: 'boolean';
  readonly value: boolean;
}

export interface DateValue {
  readonly type: 'date';
  /** Milliseconds since the Unix epoch */
  readonly value: number;
}

export interface ErrorValue {
  readonly type: 'error';
  readonly code: ErrorCode;
  /** Optional detail, never part of the display */
  readonly message?: string;
}

export type ScalarValue =
  | BlankValue
  | NumberValue
  | TextValue
  | BooleanValue
  | DateValue
  | ErrorValue;

export type Value = ScalarValue | ArrayValue | ObjectValue | FunctionValue;

export type ValueKind = 'scalar' | 'array' | 'object' | 'function' | 'error';

// ============================================================================
// Factories
// ============================================================================

export const BLANK: BlankValue = Object.freeze<BlankValue>({ type: 'blank' });

export function numberValue(value: number): NumberValue {
  return Object.freeze<NumberValue>({ type: 'number', value });
}

export function textValue(value: string): TextValue {
  return Object.freeze<TextValue>({ type: 'text', value });
}

export function booleanValue(value: boolean): BooleanValue {
  return value ? TRUE : FALSE;
}

export function dateValue(value: number | Date): DateValue {
  const ms = value instanceof Date ? value.getTime() : value;
  return Object.freeze<DateValue>({ type: 'date', value: ms });
}

export function errorValue(code: ErrorCode, message?: string): ErrorValue {
  const error: ErrorValue = message === undefined ? { type: 'error', code } : { type: 'error', code, message };
  return Object.freeze(error);
}

export const TRUE: BooleanValue = Object.freeze<BooleanValue>({ type: 'boolean', value: true });
export const FALSE: BooleanValue = Object.freeze<BooleanValue>({ type: 'boolean', value: false });

// ============================================================================
// Guards
// ============================================================================

export function isScalar(value: Value): value is ScalarValue {
  switch (value.type) {
    case 'blank':
    case 'number':
    case 'text':
    case 'boolean':
    case 'date':
    case 'error':
      return true;
    default:
      return false;
  }
}

export function isError(value: Value): value is ErrorValue {
  return value.type === 'error';
}

export function isErrorCode(text: string): text is ErrorCode {
  return ERROR_CODES.some((code) => code === text);
}

// ============================================================================
// Introspection
// ============================================================================

export function kindOf(value: Value): ValueKind {
  switch (value.type) {
    case 'error':
      return 'error';
    case 'array':
      return 'array';
    case 'object':
      return 'object';
    case 'function':
      return 'function';
    default:
      return 'scalar';
  }
}

/**
 * Type name reported by `typeof()`
 */
export function typeName(value: Value): string {
  switch (value.type) {
    case 'array':
    case 'object':
      return value.typeName;
    default:
      return value.type;
  }
}

/**
 * Shortest decimal rendering without exponent notation
 */
export function formatNumber(value: number): string {
  const text = String(value);
  if (!Number.isFinite(value) || !text.includes('e')) {
    return text;
  }

  const [mantissa, exponentText] = text.split('e');
  const negative = mantissa.startsWith('-');
  const unsigned = negative ? mantissa.slice(1) : mantissa;
  const dot = unsigned.indexOf('.');
  const digits = unsigned.replace('.', '');
  const point = (dot < 0 ? unsigned.length : dot) + Number(exponentText);

  let result: string;
  if (point <= 0) {
    result = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    result = digits + '0'.repeat(point - digits.length);
  } else {
    result = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${result}` : result;
}

/**
 * ISO calendar date (UTC) of a date value
 */
export function formatDate(ms: number): string {
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) {
    return ErrorCode.value;
  }
  return date.toISOString().slice(0, 10);
}

/**
 * Canonical display string of any value
 */
export function display(value: Value): string {
  switch (value.type) {
    case 'blank':
      return '';
    case 'number':
      return formatNumber(value.value);
    case 'text':
      return value.value;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'date':
      return formatDate(value.value);
    case 'error':
      return value.code;
    case 'array':
    case 'object':
    case 'function':
      return value.toString();
  }
}
