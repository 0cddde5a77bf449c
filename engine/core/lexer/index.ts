/**
 * SheetFormula Engine - Lexer Module
 */

export { Lexer, tokenize } from './Lexer.js';
export type { LexerMode } from './Lexer.js';

export { KEYWORDS, PUNCTUATION, describeToken } from './Token.js';
export type { Token, TokenKind } from './Token.js';
