/**
 * SheetFormula Engine - Lexer
 *
 * Turns formula text into tokens on demand. The lexer never throws: anything
 * it cannot read becomes an `invalid` token and the parser reports it.
 *
 * Two modes:
 * - formula: line breaks are plain whitespace
 * - script: line breaks collapse into `eol` tokens, `#` starts a comment,
 *   a fixed set of words are keywords and `:=` is an assignment
 */

import type { Token, TokenKind } from './Token.js';
import { KEYWORDS, PUNCTUATION } from './Token.js';

export type LexerMode = 'formula' | 'script';

const IDENTIFIER_START = /[\p{L}_$]/u;
const IDENTIFIER_PART = /[\p{L}\p{N}_$]/u;

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isBlank(char: string): boolean {
  return char === ' ' || char === '\t';
}

function isNewline(char: string): boolean {
  return char === '\n' || char === '\r';
}

export class Lexer {
  private readonly input: string;
  private readonly mode: LexerMode;

  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(text: string, mode: LexerMode = 'formula') {
    this.input = text;
    this.mode = mode;

    if (this.input.startsWith('=')) {
      this.advance();
    }
  }

  /**
   * Lazily yield tokens up to and including `eof`
   */
  *tokens(): Generator<Token, void, undefined> {
    for (;;) {
      const token = this.scan();
      yield token;
      if (token.kind === 'eof') return;
    }
  }

  /**
   * Read the next token. Returns `eof` forever once the input is exhausted.
   */
  scan(): Token {
    this.skipBlanks();

    const line = this.line;
    const column = this.column;
    const char = this.peek();

    if (char === '') {
      return { kind: 'eof', literal: '', line, column };
    }

    if (this.mode === 'script') {
      if (isNewline(char)) {
        return this.scanNewlines(line, column);
      }
      if (char === '#') {
        return this.scanComment(line, column);
      }
      if (char === ':' && this.peek(1) === '=') {
        this.advance(2);
        return { kind: 'assign', literal: ':=', line, column };
      }
    }

    if (isDigit(char)) {
      return this.scanNumber(line, column);
    }
    if (char === '"' || char === "'") {
      return this.scanLiteral(char, line, column);
    }
    if (IDENTIFIER_START.test(char)) {
      return this.scanIdentifier(line, column);
    }

    return this.scanOperator(char, line, column);
  }

  // ===========================================================================
  // Scanners
  // ===========================================================================

  private scanNumber(line: number, column: number): Token {
    const start = this.offset;
    let seenDot = false;

    for (;;) {
      const char = this.peek();
      if (isDigit(char)) {
        this.advance();
      } else if (char === '.' && !seenDot) {
        seenDot = true;
        this.advance();
      } else {
        break;
      }
    }

    return { kind: 'number', literal: this.input.slice(start, this.offset), line, column };
  }

  /**
   * A doubled quote inside a literal stands for one quote character
   */
  private scanLiteral(quote: string, line: number, column: number): Token {
    this.advance();
    const start = this.offset;
    let literal = '';

    for (;;) {
      const char = this.peek();
      if (char === '') {
        return { kind: 'invalid', literal: quote + this.input.slice(start), line, column };
      }
      if (char === quote) {
        if (this.peek(1) !== quote) break;
        this.advance();
      }
      literal += char;
      this.advance();
    }

    this.advance();
    return { kind: 'literal', literal, line, column };
  }

  private scanIdentifier(line: number, column: number): Token {
    const start = this.offset;
    while (this.peek() !== '' && IDENTIFIER_PART.test(this.peek())) {
      this.advance();
    }

    const literal = this.input.slice(start, this.offset);
    const kind: TokenKind =
      this.mode === 'script' && KEYWORDS.has(literal) ? 'keyword' : 'identifier';
    return { kind, literal, line, column };
  }

  private scanComment(line: number, column: number): Token {
    this.advance();
    const start = this.offset;
    while (this.peek() !== '' && !isNewline(this.peek())) {
      this.advance();
    }
    return { kind: 'comment', literal: this.input.slice(start, this.offset).trim(), line, column };
  }

  private scanNewlines(line: number, column: number): Token {
    while (isNewline(this.peek()) || isBlank(this.peek())) {
      this.advance();
    }
    return { kind: 'eol', literal: '', line, column };
  }

  private scanOperator(char: string, line: number, column: number): Token {
    const next = this.peek(1);

    if (char === '<' && (next === '=' || next === '>')) {
      this.advance(2);
      return { kind: next === '=' ? 'le' : 'ne', literal: char + next, line, column };
    }
    if (char === '>' && next === '=') {
      this.advance(2);
      return { kind: 'ge', literal: '>=', line, column };
    }

    this.advance();
    const kind = PUNCTUATION[char];
    if (kind === undefined) {
      return { kind: 'invalid', literal: char, line, column };
    }
    return { kind, literal: char, line, column };
  }

  // ===========================================================================
  // Cursor
  // ===========================================================================

  private peek(ahead = 0): string {
    return this.input.charAt(this.offset + ahead);
  }

  private advance(count = 1): void {
    for (let i = 0; i < count && this.offset < this.input.length; i++) {
      const char = this.input[this.offset];
      this.offset++;

      if (char === '\n') {
        this.line++;
        this.column = 1;
      } else if (char === '\r') {
        if (this.peek() !== '\n') {
          this.line++;
          this.column = 1;
        }
      } else {
        this.column++;
      }
    }
  }

  private skipBlanks(): void {
    for (;;) {
      const char = this.peek();
      if (isBlank(char) || (this.mode === 'formula' && isNewline(char))) {
        this.advance();
      } else {
        return;
      }
    }
  }
}

/**
 * Tokenize the whole input eagerly, `eof` included
 */
export function tokenize(text: string, mode: LexerMode = 'formula'): Token[] {
  return [...new Lexer(text, mode).tokens()];
}
