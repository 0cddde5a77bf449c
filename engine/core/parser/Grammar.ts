/**
 * SheetFormula Engine - Formula Grammar
 *
 * Prefix and infix parse rules keyed by token kind, with the binding power of
 * every infix token. A grammar is plain data: build a fresh one per parser or
 * share one between parsers, nothing in it is mutated while parsing.
 */

import type { TokenKind } from '../lexer/Token.js';
import type { Parser } from './Parser.js';
import type { Expr, BinaryOperator, CellExpr } from './Ast.js';
import {
  identifierExpr,
  numberExpr,
  literalExpr,
  unaryExpr,
  binaryExpr,
  callExpr,
  cellExpr,
  rangeExpr,
} from './Ast.js';
import { BindingPower, BINARY_OPERATORS } from './Precedence.js';
import { tryDecodeAddress } from '../address/AddressCodec.js';

export type PrefixRule = (parser: Parser) => Expr;
export type InfixRule = (parser: Parser, left: Expr) => Expr;

export class Grammar {
  private readonly prefixRules: Map<TokenKind, PrefixRule> = new Map();
  private readonly infixRules: Map<TokenKind, InfixRule> = new Map();
  private readonly powers: Map<TokenKind, number> = new Map();

  registerPrefix(kind: TokenKind, rule: PrefixRule): this {
    this.prefixRules.set(kind, rule);
    return this;
  }

  registerInfix(kind: TokenKind, power: number, rule: InfixRule): this {
    this.infixRules.set(kind, rule);
    this.powers.set(kind, power);
    return this;
  }

  prefix(kind: TokenKind): PrefixRule | undefined {
    return this.prefixRules.get(kind);
  }

  infix(kind: TokenKind): InfixRule | undefined {
    return this.infixRules.get(kind);
  }

  /**
   * Binding power of an infix token; tokens without an infix rule bind at
   * `lowest` and therefore end an expression
   */
  power(kind: TokenKind): number {
    return this.powers.get(kind) ?? BindingPower.lowest;
  }
}

// ===========================================================================
// Formula Rules
// ===========================================================================

const BINARY_TOKENS: ReadonlyArray<[TokenKind, BinaryOperator]> = [
  ['add', '+'],
  ['sub', '-'],
  ['mul', '*'],
  ['div', '/'],
  ['pow', '^'],
  ['concat', '&'],
  ['eq', '='],
  ['ne', '<>'],
  ['lt', '<'],
  ['le', '<='],
  ['gt', '>'],
  ['ge', '>='],
];

function parseNumber(parser: Parser): Expr {
  const token = parser.next();
  const value = Number(token.literal);
  if (Number.isNaN(value)) {
    throw parser.error(`invalid number ${token.literal}`, token);
  }
  return numberExpr(value);
}

function parseLiteral(parser: Parser): Expr {
  const token = parser.next();
  if (parser.current.kind === 'sheet') {
    parser.next();
    return parseQualifiedReference(parser, token.literal);
  }
  return literalExpr(token.literal);
}

/**
 * An identifier is a call target when `(` follows, a sheet name when `!`
 * follows, a cell reference when it decodes as an address, and a plain name
 * otherwise.
 */
function parseAddressOrIdentifier(parser: Parser): Expr {
  const token = parser.next();

  if (parser.current.kind === 'begin-group') {
    return identifierExpr(token.literal);
  }
  if (parser.current.kind === 'sheet') {
    parser.next();
    return parseQualifiedReference(parser, token.literal);
  }

  const position = tryDecodeAddress(token.literal);
  if (position === null) {
    if (token.literal.includes('$')) {
      throw parser.error(`invalid cell address ${token.literal}`, token);
    }
    return identifierExpr(token.literal);
  }
  return parseRangeTail(parser, cellExpr(position));
}

function parseQualifiedReference(parser: Parser, sheet: string): Expr {
  const token = parser.expect('identifier');
  const position = tryDecodeAddress(token.literal);
  if (position === null) {
    throw parser.error(`invalid cell address ${token.literal}`, token);
  }
  return parseRangeTail(parser, cellExpr({ ...position, sheet }));
}

function parseRangeTail(parser: Parser, start: CellExpr): Expr {
  if (parser.current.kind !== 'range') {
    return start;
  }
  parser.next();

  const token = parser.expect('identifier');
  const position = tryDecodeAddress(token.literal);
  if (position === null) {
    throw parser.error(`invalid cell address ${token.literal}`, token);
  }
  return rangeExpr(start, cellExpr({ ...position, sheet: start.position.sheet }));
}

function parseUnary(parser: Parser): Expr {
  const token = parser.next();
  const operand = parser.parseExpression(BindingPower.unary);
  return unaryExpr(token.kind === 'sub' ? '-' : '+', operand);
}

function parseGroup(parser: Parser): Expr {
  parser.next();
  const expr = parser.parseExpression(BindingPower.lowest);
  parser.expect('end-group');
  return expr;
}

function binaryRule(operator: BinaryOperator): InfixRule {
  const { power, rightAssociative } = BINARY_OPERATORS[operator];
  return (parser, left) => {
    parser.next();
    const right = parser.parseExpression(rightAssociative ? power - 1 : power);
    return binaryExpr(operator, left, right);
  };
}

function parseCall(parser: Parser, callee: Expr): Expr {
  parser.next();
  const args: Expr[] = [];

  if (parser.current.kind === 'end-group') {
    parser.next();
    return callExpr(callee, args);
  }

  for (;;) {
    args.push(parser.parseExpression(BindingPower.lowest));
    if (parser.current.kind !== 'comma') break;
    parser.next();
  }
  parser.expect('end-group');

  return callExpr(callee, args);
}

/**
 * Build the grammar of spreadsheet formulas
 */
export function formulaGrammar(): Grammar {
  const grammar = new Grammar()
    .registerPrefix('number', parseNumber)
    .registerPrefix('literal', parseLiteral)
    .registerPrefix('identifier', parseAddressOrIdentifier)
    .registerPrefix('add', parseUnary)
    .registerPrefix('sub', parseUnary)
    .registerPrefix('begin-group', parseGroup)
    .registerInfix('begin-group', BindingPower.call, parseCall);

  for (const [kind, operator] of BINARY_TOKENS) {
    grammar.registerInfix(kind, BINARY_OPERATORS[operator].power, binaryRule(operator));
  }

  return grammar;
}
