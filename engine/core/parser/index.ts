/**
 * SheetFormula Engine - Parser Module
 */

export { Parser, parseFormula } from './Parser.js';
export { Grammar, formulaGrammar } from './Grammar.js';
export type { PrefixRule, InfixRule } from './Grammar.js';
export { BindingPower, BINARY_OPERATORS } from './Precedence.js';
export {
  identifierExpr,
  numberExpr,
  literalExpr,
  unaryExpr,
  binaryExpr,
  callExpr,
  cellExpr,
  rangeExpr,
  isBinaryOperator,
  isComparison,
  formatExpr,
  cloneWithOffset,
  walkExpr,
} from './Ast.js';
export type {
  Expr,
  ExprType,
  IdentifierExpr,
  NumberExpr,
  LiteralExpr,
  UnaryExpr,
  BinaryExpr,
  CallExpr,
  CellExpr,
  RangeExpr,
  UnaryOperator,
  BinaryOperator,
} from './Ast.js';
export { dumpExpr } from './AstDump.js';
