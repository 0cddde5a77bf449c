/**
 * SheetFormula Engine - Lexer Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { Lexer, tokenize } from './Lexer.js';
import type { Token } from './Token.js';
import { describeToken } from './Token.js';

function kinds(text: string, mode: 'formula' | 'script' = 'formula'): string[] {
  return tokenize(text, mode).map((t) => t.kind);
}

function literals(text: string): string[] {
  return tokenize(text).map((t) => t.literal);
}

describe('Lexer', () => {
  describe('formula mode', () => {
    it('should skip a leading equal sign', () => {
      expect(kinds('=1+2')).toEqual(['number', 'add', 'number', 'eof']);
    });

    it('should treat a second equal sign as an operator', () => {
      expect(kinds('==1')).toEqual(['eq', 'number', 'eof']);
    });

    it('should scan numbers with at most one dot', () => {
      expect(literals('3.14')).toEqual(['3.14', '']);
      expect(kinds('1.2.3')).toEqual(['number', 'dot', 'number', 'eof']);
      expect(literals('1.2.3')).toEqual(['1.2', '.', '3', '']);
    });

    it('should scan literals with either quote', () => {
      const tokens = tokenize(`'foo' & "b'ar"`);
      expect(tokens.map((t) => t.kind)).toEqual(['literal', 'concat', 'literal', 'eof']);
      expect(tokens[0].literal).toBe('foo');
      expect(tokens[2].literal).toBe("b'ar");
    });

    it('should read a doubled quote as one quote character', () => {
      expect(literals(`'O''Brien'!A1`)).toEqual(["O'Brien", '!', 'A1', '']);
      expect(literals(`"say ""hi"""`)).toEqual(['say "hi"', '']);
    });

    it('should report an unterminated literal as invalid', () => {
      const [token] = tokenize('"abc');
      expect(token.kind).toBe('invalid');
      expect(token.literal).toBe('"abc');
    });

    it('should scan identifiers with digits, underscores and dollars', () => {
      expect(literals('$A$1 total_2')).toEqual(['$A$1', 'total_2', '']);
      expect(kinds('Sheet1!B2:C3')).toEqual([
        'identifier',
        'sheet',
        'identifier',
        'range',
        'identifier',
        'eof',
      ]);
    });

    it('should scan two-character comparison operators', () => {
      expect(kinds('a<=b<>c>=d<e>f')).toEqual([
        'identifier', 'le', 'identifier', 'ne', 'identifier', 'ge',
        'identifier', 'lt', 'identifier', 'gt', 'identifier', 'eof',
      ]);
    });

    it('should map punctuation', () => {
      expect(kinds('(a;b,c)[x]{y}%^*/-')).toEqual([
        'begin-group', 'identifier', 'comma', 'identifier', 'comma', 'identifier',
        'end-group', 'begin-prop', 'identifier', 'end-prop', 'begin-block',
        'identifier', 'end-block', 'percent', 'pow', 'mul', 'div', 'sub', 'eof',
      ]);
    });

    it('should not recognize keywords or comments', () => {
      expect(kinds('let')).toEqual(['identifier', 'eof']);
      expect(kinds('#')).toEqual(['invalid', 'eof']);
    });

    it('should treat line breaks as whitespace', () => {
      expect(kinds('1\n+\r\n2')).toEqual(['number', 'add', 'number', 'eof']);
    });

    it('should consume unknown characters one at a time', () => {
      const tokens = tokenize('1 ? 2');
      expect(tokens.map((t) => t.kind)).toEqual(['number', 'invalid', 'number', 'eof']);
      expect(tokens[1].literal).toBe('?');
    });
  });

  describe('positions', () => {
    it('should report 1-based line and column of the first character', () => {
      const tokens = tokenize('=sum(A1,\n  42)');
      const at = (t: Token) => [t.literal, t.line, t.column];
      expect(tokens.map(at)).toEqual([
        ['sum', 1, 2],
        ['(', 1, 5],
        ['A1', 1, 6],
        [',', 1, 8],
        ['42', 2, 3],
        [')', 2, 5],
        ['', 2, 6],
      ]);
    });
  });

  describe('script mode', () => {
    it('should collapse line breaks into one eol token', () => {
      expect(kinds('a\n\n  \nb', 'script')).toEqual(['identifier', 'eol', 'identifier', 'eof']);
    });

    it('should scan comments to the end of the line', () => {
      const tokens = tokenize('# totals \nlet', 'script');
      expect(tokens.map((t) => t.kind)).toEqual(['comment', 'eol', 'keyword', 'eof']);
      expect(tokens[0].literal).toBe('totals');
    });

    it('should scan assignment', () => {
      expect(kinds('let x := 1', 'script')).toEqual([
        'keyword', 'identifier', 'assign', 'number', 'eof',
      ]);
    });

    it('should keep a plain colon as a range operator', () => {
      expect(kinds('A1:B2', 'script')).toEqual(['identifier', 'range', 'identifier', 'eof']);
    });
  });

  describe('scan', () => {
    it('should keep returning eof at the end', () => {
      const lexer = new Lexer('1');
      expect(lexer.scan().kind).toBe('number');
      expect(lexer.scan().kind).toBe('eof');
      expect(lexer.scan().kind).toBe('eof');
    });

    it('should stop the generator after eof', () => {
      expect([...new Lexer('').tokens()]).toHaveLength(1);
    });
  });

  describe('describeToken', () => {
    it('should describe tokens for error messages', () => {
      const [num, , lit, eof] = tokenize('1 + "x"');
      expect(describeToken(num)).toBe('number 1');
      expect(describeToken(lit)).toBe('literal "x"');
      expect(describeToken(eof)).toBe('end of input');
    });
  });
});
