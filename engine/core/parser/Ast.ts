/**
 * SheetFormula Engine - Formula AST
 *
 * Closed set of expression nodes produced by the parser. Nodes are frozen
 * once built; relocation (cloneWithOffset) always builds a new tree.
 */

import type { Position } from '../types/index.js';
import { encodeAddress, offsetPosition } from '../address/AddressCodec.js';
import { formatNumber } from '../values/Value.js';
import type { ComparisonOperator } from '../values/Coercion.js';
import { BINARY_OPERATORS, BindingPower } from './Precedence.js';

// ============================================================================
// Node Types
// ============================================================================

export type UnaryOperator = '+' | '-';

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '^' | '&'
  | '=' | '<>' | '<' | '<=' | '>' | '>=';

export interface IdentifierExpr {
  readonly type: 'identifier';
  readonly name: string;
}

export interface NumberExpr {
  readonly type: 'number';
  readonly value: number;
}

export interface LiteralExpr {
  readonly type: 'literal';
  readonly value: string;
}

export interface UnaryExpr {
  readonly type: 'unary';
  readonly operator: UnaryOperator;
  readonly operand: Expr;
}

export interface BinaryExpr {
  readonly type: 'binary';
  readonly operator: BinaryOperator;
  readonly left: Expr;
  readonly right: Expr;
}

export interface CallExpr {
  readonly type: 'call';
  readonly callee: Expr;
  readonly args: readonly Expr[];
}

export interface CellExpr {
  readonly type: 'cell';
  readonly position: Readonly<Position>;
}

export interface RangeExpr {
  readonly type: 'range';
  readonly start: CellExpr;
  readonly end: CellExpr;
}

export type Expr =
  | IdentifierExpr
  | NumberExpr
  | LiteralExpr
  | UnaryExpr
  | BinaryExpr
  | CallExpr
  | CellExpr
  | RangeExpr;

export type ExprType = Expr['type'];

// ============================================================================
// Factories
// ============================================================================

function freeze<T extends Expr>(node: T): T {
  Object.freeze(node);
  return node;
}

export function identifierExpr(name: string): IdentifierExpr {
  return freeze<IdentifierExpr>({ type: 'identifier', name });
}

export function numberExpr(value: number): NumberExpr {
  return freeze<NumberExpr>({ type: 'number', value });
}

export function literalExpr(value: string): LiteralExpr {
  return freeze<LiteralExpr>({ type: 'literal', value });
}

export function unaryExpr(operator: UnaryOperator, operand: Expr): UnaryExpr {
  return freeze<UnaryExpr>({ type: 'unary', operator, operand });
}

export function binaryExpr(operator: BinaryOperator, left: Expr, right: Expr): BinaryExpr {
  return freeze<BinaryExpr>({ type: 'binary', operator, left, right });
}

export function callExpr(callee: Expr, args: readonly Expr[]): CallExpr {
  return freeze<CallExpr>({ type: 'call', callee, args: Object.freeze([...args]) });
}

export function cellExpr(position: Position): CellExpr {
  return freeze<CellExpr>({ type: 'cell', position: Object.freeze({ ...position }) });
}

export function rangeExpr(start: CellExpr, end: CellExpr): RangeExpr {
  return freeze<RangeExpr>({ type: 'range', start, end });
}

export function isBinaryOperator(text: string): text is BinaryOperator {
  return Object.prototype.hasOwnProperty.call(BINARY_OPERATORS, text);
}

export function isComparison(operator: BinaryOperator): operator is ComparisonOperator {
  const { power } = BINARY_OPERATORS[operator];
  return power === BindingPower.equality || power === BindingPower.comparison;
}

// ============================================================================
// Rendering
// ============================================================================

function precedenceOf(expr: Expr): number {
  switch (expr.type) {
    case 'binary':
      return BINARY_OPERATORS[expr.operator].power;
    case 'unary':
      return BindingPower.unary;
    default:
      return BindingPower.call;
  }
}

function formatLiteral(value: string): string {
  if (value.includes('"') && !value.includes("'")) {
    return `'${value}'`;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

function formatOperand(expr: Expr, parentPower: number, wrapOnTie: boolean): string {
  const power = precedenceOf(expr);
  const text = formatExpr(expr);
  if (power < parentPower || (power === parentPower && wrapOnTie)) {
    return `(${text})`;
  }
  return text;
}

/**
 * Render an expression back to formula text (without the leading `=`).
 * Parentheses are emitted only where precedence requires them, so the output
 * parses back to the same tree.
 */
export function formatExpr(expr: Expr): string {
  switch (expr.type) {
    case 'identifier':
      return expr.name;
    case 'number':
      return formatNumber(expr.value);
    case 'literal':
      return formatLiteral(expr.value);
    case 'unary': {
      const operand = expr.operand.type === 'binary'
        ? `(${formatExpr(expr.operand)})`
        : formatExpr(expr.operand);
      return `${expr.operator}${operand}`;
    }
    case 'binary': {
      const { power, rightAssociative } = BINARY_OPERATORS[expr.operator];
      const left = formatOperand(expr.left, power, rightAssociative);
      const right = formatOperand(expr.right, power, !rightAssociative);
      return `${left} ${expr.operator} ${right}`;
    }
    case 'call':
      return `${formatExpr(expr.callee)}(${expr.args.map(formatExpr).join(', ')})`;
    case 'cell':
      return encodeAddress(expr.position);
    case 'range':
      return `${encodeAddress(expr.start.position)}:${encodeAddress({ ...expr.end.position, sheet: undefined })}`;
  }
}

// ============================================================================
// Relocation
// ============================================================================

/**
 * Copy an expression as if its formula moved by (deltaRow, deltaColumn).
 * Relative references shift; absolute components, literals and function
 * names stay as they are.
 */
export function cloneWithOffset(expr: Expr, deltaRow: number, deltaColumn: number): Expr {
  switch (expr.type) {
    case 'identifier':
    case 'number':
    case 'literal':
      return expr;
    case 'unary':
      return unaryExpr(expr.operator, cloneWithOffset(expr.operand, deltaRow, deltaColumn));
    case 'binary':
      return binaryExpr(
        expr.operator,
        cloneWithOffset(expr.left, deltaRow, deltaColumn),
        cloneWithOffset(expr.right, deltaRow, deltaColumn)
      );
    case 'call':
      return callExpr(
        expr.callee,
        expr.args.map((arg) => cloneWithOffset(arg, deltaRow, deltaColumn))
      );
    case 'cell':
      return cellExpr(offsetPosition(expr.position, deltaRow, deltaColumn));
    case 'range':
      return rangeExpr(
        cellExpr(offsetPosition(expr.start.position, deltaRow, deltaColumn)),
        cellExpr(offsetPosition(expr.end.position, deltaRow, deltaColumn))
      );
  }
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Visit every node depth-first, parents before children
 */
export function walkExpr(expr: Expr, visit: (node: Expr) => void): void {
  visit(expr);
  switch (expr.type) {
    case 'unary':
      walkExpr(expr.operand, visit);
      break;
    case 'binary':
      walkExpr(expr.left, visit);
      walkExpr(expr.right, visit);
      break;
    case 'call':
      walkExpr(expr.callee, visit);
      for (const arg of expr.args) {
        walkExpr(arg, visit);
      }
      break;
    case 'range':
      walkExpr(expr.start, visit);
      walkExpr(expr.end, visit);
      break;
    default:
      break;
  }
}
