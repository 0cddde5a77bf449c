/**
 * SheetFormula Engine - Call Arguments
 *
 * ExprArgument defers evaluation to the callee; ValueArgument wraps a value
 * that is already known (host code calling a function directly).
 */

import type { Expr } from '../parser/Ast.js';
import { isComparison } from '../parser/Ast.js';
import type { Value, ScalarValue } from '../values/Value.js';
import { isScalar } from '../values/Value.js';
import type { Argument, PredicateArgument } from '../values/FunctionValue.js';
import { comparisonPredicate } from '../values/Predicate.js';
import type { Context } from '../context/Context.js';
import { evaluate } from './Evaluator.js';

function operandOf(value: Value): ScalarValue | null {
  if (isScalar(value)) {
    return value;
  }
  if (value.type === 'array') {
    const { rows, columns } = value.dimension;
    return rows === 1 && columns === 1 ? value.at(0, 0) : null;
  }
  return null;
}

export class ExprArgument implements Argument {
  readonly kind = 'expr' as const;
  readonly expression: Expr;

  constructor(expression: Expr) {
    this.expression = expression;
  }

  evaluate(context: Context): Value {
    return evaluate(this.expression, context);
  }

  /**
   * `source <op> operand` becomes a filter over the source: the right side
   * is evaluated once into the operand, the left side into the source
   */
  tryAsPredicate(context: Context): PredicateArgument | null {
    const expr = this.expression;
    if (expr.type !== 'binary' || !isComparison(expr.operator)) {
      return null;
    }

    const operand = operandOf(evaluate(expr.right, context));
    if (operand === null) {
      return null;
    }

    return {
      predicate: comparisonPredicate(expr.operator, operand),
      source: evaluate(expr.left, context),
    };
  }
}

export class ValueArgument implements Argument {
  readonly kind = 'value' as const;
  readonly value: Value;

  constructor(value: Value) {
    this.value = value;
  }

  evaluate(_context: Context): Value {
    return this.value;
  }

  tryAsPredicate(_context: Context): PredicateArgument | null {
    return null;
  }
}
