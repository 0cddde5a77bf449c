/**
 * SheetFormula Engine - Pratt Parser
 *
 * Keeps a current/lookahead token pair over the lexer and drives the rules of
 * a Grammar. A failed parse throws FormulaSyntaxError; no partial tree is
 * ever returned.
 */

import type { Token, TokenKind } from '../lexer/Token.js';
import { describeToken } from '../lexer/Token.js';
import { Lexer } from '../lexer/Lexer.js';
import type { Expr } from './Ast.js';
import type { Grammar } from './Grammar.js';
import { formulaGrammar } from './Grammar.js';
import { BindingPower } from './Precedence.js';
import { FormulaSyntaxError } from '../errors/index.js';

export class Parser {
  private readonly lexer: Lexer;
  private readonly grammar: Grammar;

  private currentToken: Token;
  private lookaheadToken: Token;

  constructor(text: string, grammar: Grammar = formulaGrammar()) {
    this.lexer = new Lexer(text, 'formula');
    this.grammar = grammar;
    this.currentToken = this.lexer.scan();
    this.lookaheadToken = this.lexer.scan();
  }

  get current(): Token {
    return this.currentToken;
  }

  get lookahead(): Token {
    return this.lookaheadToken;
  }

  /**
   * Parse the whole input as a single expression
   */
  parse(): Expr {
    const expr = this.parseExpression(BindingPower.lowest);
    if (this.currentToken.kind !== 'eof') {
      throw this.unexpected();
    }
    return expr;
  }

  parseExpression(power: number): Expr {
    const prefix = this.grammar.prefix(this.currentToken.kind);
    if (prefix === undefined) {
      throw this.unexpected();
    }

    let left = prefix(this);
    while (power < this.grammar.power(this.currentToken.kind)) {
      const infix = this.grammar.infix(this.currentToken.kind);
      if (infix === undefined) break;
      left = infix(this, left);
    }
    return left;
  }

  // ===========================================================================
  // Token Helpers
  // ===========================================================================

  /**
   * Advance and return the token that was current
   */
  next(): Token {
    const token = this.currentToken;
    this.currentToken = this.lookaheadToken;
    this.lookaheadToken = this.lexer.scan();
    return token;
  }

  /**
   * Consume a token of the given kind or fail
   */
  expect(kind: TokenKind): Token {
    if (this.currentToken.kind !== kind) {
      throw this.unexpected();
    }
    return this.next();
  }

  error(message: string, token: Token = this.currentToken): FormulaSyntaxError {
    return new FormulaSyntaxError(message, token.line, token.column);
  }

  private unexpected(): FormulaSyntaxError {
    return this.error(`unexpected ${describeToken(this.currentToken)}`);
  }
}

/**
 * Parse formula text (with or without a leading `=`) into an expression
 * @throws FormulaSyntaxError
 */
export function parseFormula(text: string): Expr {
  return new Parser(text).parse();
}
