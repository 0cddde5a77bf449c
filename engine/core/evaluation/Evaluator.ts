/**
 * SheetFormula Engine - Evaluator
 *
 * Tree-walking interpreter from AST to Value against a Context. In-language
 * failures come back as error values; only structural failures (undefined
 * names, calling a non-function, arity) are thrown.
 *
 * Operator rules:
 * - an error operand is returned unchanged, left operand first
 * - arithmetic coerces with toNumber, concatenation with toText
 * - comparisons need operands of the same variant, else #VALUE!
 * - an array operand makes the operator elementwise, with modulo broadcast
 */

import type { Expr, UnaryExpr, BinaryExpr, CallExpr, BinaryOperator } from '../parser/Ast.js';
import { isComparison } from '../parser/Ast.js';
import type { Value, ScalarValue } from '../values/Value.js';
import {
  ErrorCode,
  numberValue,
  textValue,
  booleanValue,
  errorValue,
  isScalar,
} from '../values/Value.js';
import { ArrayValue } from '../values/ArrayValue.js';
import { toNumber, toText, compareValues } from '../values/Coercion.js';
import type { Context } from '../context/Context.js';
import { ExprArgument } from './Argument.js';
import { NotCallableError, IncompatibleValuesError } from '../errors/index.js';

export function evaluate(expr: Expr, context: Context): Value {
  switch (expr.type) {
    case 'number':
      return numberValue(expr.value);
    case 'literal':
      return textValue(expr.value);
    case 'identifier':
      return context.resolve(expr.name);
    case 'unary':
      return evaluateUnary(expr, context);
    case 'binary':
      return evaluateBinary(expr, context);
    case 'call':
      return evaluateCall(expr, context);
    case 'cell':
      return context.at(expr.position);
    case 'range':
      return context.range(expr.start.position, expr.end.position);
  }
}

// ============================================================================
// Unary
// ============================================================================

function negateScalar(operator: '+' | '-', value: ScalarValue): ScalarValue {
  switch (value.type) {
    case 'error':
      return value;
    case 'number':
      return operator === '-' ? numberValue(-value.value) : value;
    default:
      return errorValue(ErrorCode.value);
  }
}

function evaluateUnary(expr: UnaryExpr, context: Context): Value {
  const operand = evaluate(expr.operand, context);

  if (operand.type === 'array') {
    return new ArrayValue(operand.rows()).apply((value) => negateScalar(expr.operator, value));
  }
  if (!isScalar(operand)) {
    return errorValue(ErrorCode.value);
  }
  return negateScalar(expr.operator, operand);
}

// ============================================================================
// Binary
// ============================================================================

type ArithmeticOperator = '+' | '-' | '*' | '/' | '^';

function compute(operator: ArithmeticOperator, left: number, right: number): number {
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      return left / right;
    case '^':
      return Math.pow(left, right);
  }
}

function arithmetic(operator: ArithmeticOperator, left: number, right: number): ScalarValue {
  if (operator === '/' && right === 0) {
    return errorValue(ErrorCode.divideByZero);
  }
  const result = compute(operator, left, right);
  return Number.isFinite(result) ? numberValue(result) : errorValue(ErrorCode.num);
}

/**
 * Apply a binary operator to two scalars
 */
export function applyBinary(operator: BinaryOperator, left: ScalarValue, right: ScalarValue): ScalarValue {
  if (left.type === 'error') return left;
  if (right.type === 'error') return right;

  if (isComparison(operator)) {
    try {
      return booleanValue(compareValues(operator, left, right));
    } catch (error) {
      if (error instanceof IncompatibleValuesError) {
        return errorValue(ErrorCode.value, error.message);
      }
      throw error;
    }
  }

  if (operator === '&') {
    const a = toText(left);
    if (a.type === 'error') return a;
    const b = toText(right);
    if (b.type === 'error') return b;
    return textValue(a.value + b.value);
  }

  const a = toNumber(left);
  if (a.type === 'error') return a;
  const b = toNumber(right);
  if (b.type === 'error') return b;
  return arithmetic(operator, a.value, b.value);
}

function evaluateBinary(expr: BinaryExpr, context: Context): Value {
  const left = evaluate(expr.left, context);
  if (left.type === 'error') return left;

  const right = evaluate(expr.right, context);
  if (right.type === 'error') return right;

  if (left.type === 'array' || right.type === 'array') {
    const a = left.type === 'array' ? left : isScalar(left) ? ArrayValue.of(left) : null;
    const b = right.type === 'array' ? right : isScalar(right) ? ArrayValue.of(right) : null;
    if (a === null || b === null) {
      return errorValue(ErrorCode.value);
    }
    return a.applyWith(b, (x, y) => applyBinary(expr.operator, x, y));
  }

  if (!isScalar(left) || !isScalar(right)) {
    return errorValue(ErrorCode.value);
  }
  return applyBinary(expr.operator, left, right);
}

// ============================================================================
// Calls
// ============================================================================

function evaluateCall(expr: CallExpr, context: Context): Value {
  if (expr.callee.type !== 'identifier') {
    return errorValue(ErrorCode.name);
  }

  const name = expr.callee.name;
  const callee = context.resolve(name);
  if (callee.type !== 'function') {
    throw new NotCallableError(name);
  }

  return callee.call(expr.args.map((arg) => new ExprArgument(arg)), context);
}
