/**
 * SheetFormula Engine - Coercion and Comparison
 *
 * Conversions between scalar variants and the ordering used by comparison
 * operators. Error operands come back unchanged from every conversion.
 */

import type {
  Value,
  ScalarValue,
  NumberValue,
  TextValue,
  BooleanValue,
  ErrorValue,
} from './Value.js';
import {
  BLANK,
  ErrorCode,
  numberValue,
  textValue,
  booleanValue,
  dateValue,
  errorValue,
  isErrorCode,
  display,
  formatDate,
} from './Value.js';
import { IncompatibleValuesError } from '../errors/index.js';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a decimal number, or null when the text is not one
 */
export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

/**
 * Collapse a 1x1 array to its element; anything else that is not a scalar
 * has no scalar reading
 */
function asScalar(value: Value): ScalarValue | null {
  switch (value.type) {
    case 'array': {
      const { rows, columns } = value.dimension;
      return rows === 1 && columns === 1 ? value.at(0, 0) : null;
    }
    case 'object':
    case 'function':
      return null;
    default:
      return value;
  }
}

export function toNumber(value: Value): NumberValue | ErrorValue {
  const scalar = asScalar(value);
  if (scalar === null) {
    return errorValue(ErrorCode.value);
  }

  switch (scalar.type) {
    case 'number':
    case 'error':
      return scalar;
    case 'blank':
      return numberValue(0);
    case 'boolean':
      return numberValue(scalar.value ? 1 : 0);
    case 'text': {
      const parsed = parseNumber(scalar.value);
      return parsed === null ? errorValue(ErrorCode.na) : numberValue(parsed);
    }
    case 'date':
      return numberValue(Math.floor(scalar.value / 1000));
  }
}

export function toText(value: Value): TextValue | ErrorValue {
  const scalar = asScalar(value);
  if (scalar === null) {
    return errorValue(ErrorCode.value);
  }
  if (scalar.type === 'error' || scalar.type === 'text') {
    return scalar;
  }
  return textValue(display(scalar));
}

export function toBool(value: Value): BooleanValue | ErrorValue {
  const scalar = asScalar(value);
  if (scalar === null) {
    return errorValue(ErrorCode.value);
  }

  switch (scalar.type) {
    case 'boolean':
    case 'error':
      return scalar;
    case 'blank':
      return booleanValue(false);
    case 'number':
    case 'date':
      return booleanValue(scalar.value !== 0);
    case 'text':
      return booleanValue(scalar.value !== '');
  }
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Blank takes the zero value of whatever it is compared with
 */
function zeroLike(other: ScalarValue): ScalarValue {
  switch (other.type) {
    case 'number':
      return numberValue(0);
    case 'text':
      return textValue('');
    case 'boolean':
      return booleanValue(false);
    case 'date':
      return dateValue(0);
    default:
      return BLANK;
  }
}

function align(left: ScalarValue, right: ScalarValue): [ScalarValue, ScalarValue] {
  if (left.type === 'blank' && right.type !== 'blank') {
    return [zeroLike(right), right];
  }
  if (right.type === 'blank' && left.type !== 'blank') {
    return [left, zeroLike(left)];
  }
  return [left, right];
}

/**
 * @throws IncompatibleValuesError when the operands are different variants
 */
export function equalValues(left: ScalarValue, right: ScalarValue): boolean {
  const [a, b] = align(left, right);
  switch (a.type) {
    case 'blank':
      if (b.type === 'blank') return true;
      break;
    case 'number':
      if (b.type === 'number') return a.value === b.value;
      break;
    case 'text':
      if (b.type === 'text') return a.value === b.value;
      break;
    case 'boolean':
      if (b.type === 'boolean') return a.value === b.value;
      break;
    case 'date':
      if (b.type === 'date') return a.value === b.value;
      break;
    case 'error':
      if (b.type === 'error') return a.code === b.code;
      break;
  }
  throw new IncompatibleValuesError(a.type, b.type);
}

/**
 * Strict ordering, same variant only. False sorts before true.
 * @throws IncompatibleValuesError when the operands are different variants
 */
export function lessValues(left: ScalarValue, right: ScalarValue): boolean {
  const [a, b] = align(left, right);
  switch (a.type) {
    case 'blank':
      if (b.type === 'blank') return false;
      break;
    case 'number':
      if (b.type === 'number') return a.value < b.value;
      break;
    case 'text':
      if (b.type === 'text') return a.value < b.value;
      break;
    case 'boolean':
      if (b.type === 'boolean') return !a.value && b.value;
      break;
    case 'date':
      if (b.type === 'date') return a.value < b.value;
      break;
    case 'error':
      break;
  }
  throw new IncompatibleValuesError(a.type, b.type);
}

export type ComparisonOperator = '=' | '<>' | '<' | '<=' | '>' | '>=';

/**
 * Apply a comparison operator. `<=`, `>=` and `>` test equality first.
 * @throws IncompatibleValuesError
 */
export function compareValues(operator: ComparisonOperator, left: ScalarValue, right: ScalarValue): boolean {
  switch (operator) {
    case '=':
      return equalValues(left, right);
    case '<>':
      return !equalValues(left, right);
    case '<':
      return lessValues(left, right);
    case '<=':
      return equalValues(left, right) || lessValues(left, right);
    case '>':
      return !equalValues(left, right) && !lessValues(left, right);
    case '>=':
      return equalValues(left, right) || !lessValues(left, right);
  }
}

// ============================================================================
// Raw Input
// ============================================================================

/**
 * Interpret raw cell input: numbers, booleans, error codes and ISO dates are
 * recognized, everything else is text
 */
export function parseScalar(text: string): ScalarValue {
  if (text === '') {
    return BLANK;
  }

  const parsed = parseNumber(text);
  if (parsed !== null) {
    return numberValue(parsed);
  }

  const lower = text.trim().toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return booleanValue(lower === 'true');
  }

  const upper = text.trim().toUpperCase();
  if (isErrorCode(upper)) {
    return errorValue(upper);
  }

  const date = DATE_PATTERN.exec(text.trim());
  if (date) {
    const ms = Date.UTC(Number(date[1]), Number(date[2]) - 1, Number(date[3]));
    if (formatDate(ms) === date[0]) {
      return dateValue(ms);
    }
  }

  return textValue(text);
}
