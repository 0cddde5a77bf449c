/**
 * SheetFormula Engine - Parser Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { Parser, parseFormula } from './Parser.js';
import { Grammar, formulaGrammar } from './Grammar.js';
import { formatExpr, cloneWithOffset, walkExpr, numberExpr } from './Ast.js';
import type { Expr } from './Ast.js';
import { dumpExpr } from './AstDump.js';
import { BindingPower } from './Precedence.js';
import { FormulaSyntaxError } from '../errors/index.js';

function dump(text: string): string {
  return dumpExpr(parseFormula(text));
}

function syntaxError(text: string): FormulaSyntaxError {
  try {
    parseFormula(text);
  } catch (error) {
    if (error instanceof FormulaSyntaxError) return error;
    throw error;
  }
  throw new Error(`expected ${text} to fail`);
}

describe('Parser', () => {
  // ===========================================================================
  // Trees
  // ===========================================================================

  describe('precedence', () => {
    it('should bind multiplication tighter than addition', () => {
      expect(dump('1+1*2')).toBe('binary(number(1), binary(number(1), number(2), *), +)');
      expect(dump('1*1+2')).toBe('binary(binary(number(1), number(1), *), number(2), +)');
    });

    it('should associate subtraction to the left', () => {
      expect(dump('8-4-2')).toBe('binary(binary(number(8), number(4), -), number(2), -)');
    });

    it('should associate exponentiation to the right', () => {
      expect(dump('2^3^2')).toBe('binary(number(2), binary(number(3), number(2), ^), ^)');
    });

    it('should apply unary minus before exponentiation', () => {
      expect(dump('-2^2')).toBe('binary(unary(number(2), -), number(2), ^)');
      expect(dump('-42')).toBe('unary(number(42), -)');
    });

    it('should rank comparison below concatenation', () => {
      expect(dump('"a"&"b"="ab"')).toBe('binary(binary(literal(a), literal(b), &), literal(ab), =)');
    });

    it('should honour parentheses', () => {
      expect(dump('(1+2)*3')).toBe('binary(binary(number(1), number(2), +), number(3), *)');
    });
  });

  describe('operands', () => {
    it('should parse identifiers and literals', () => {
      expect(dump('foobar')).toBe('identifier(foobar)');
      expect(dump("'foo'")).toBe('literal(foo)');
      expect(dump('"foo bar"')).toBe('literal(foo bar)');
    });

    it('should normalize numbers', () => {
      expect(dump('1.50')).toBe('number(1.5)');
    });

    it('should parse calls with and without arguments', () => {
      expect(dump('one()')).toBe('call(identifier(one), args: )');
      expect(dump('sum(1, A1; 2)')).toBe(
        'call(identifier(sum), args: number(1), cell(A1, false, false), number(2))'
      );
    });

    it('should parse cell references with absolute markers', () => {
      expect(dump('A2')).toBe('cell(A2, false, false)');
      expect(dump('$A2')).toBe('cell(A2, true, false)');
      expect(dump('A$2')).toBe('cell(A2, false, true)');
      expect(dump('$A$2')).toBe('cell(A2, true, true)');
    });

    it('should parse ranges', () => {
      expect(dump('A1:A1000')).toBe('range(cell(A1, false, false), cell(A1000, false, false))');
    });

    it('should parse sheet qualified references', () => {
      expect(dump('Sheet2!B3')).toBe('cell(Sheet2!B3, false, false)');
      expect(dump("'My Sheet'!A1:B2")).toBe(
        "range(cell('My Sheet'!A1, false, false), cell('My Sheet'!B2, false, false))"
      );
    });

    it('should build frozen nodes', () => {
      const expr = parseFormula('1+A1');
      expect(Object.isFrozen(expr)).toBe(true);
      if (expr.type === 'binary') {
        expect(Object.isFrozen(expr.right)).toBe(true);
      }
    });
  });

  // ===========================================================================
  // Errors
  // ===========================================================================

  describe('syntax errors', () => {
    it('should report an unexpected end of input', () => {
      const error = syntaxError('=1+');
      expect(error.message).toBe('unexpected end of input (line 1, column 4)');
      expect(error.line).toBe(1);
      expect(error.column).toBe(4);
    });

    it('should report an unclosed group', () => {
      expect(syntaxError('(1').message).toBe('unexpected end of input (line 1, column 3)');
    });

    it('should report trailing tokens', () => {
      expect(syntaxError('1 2').message).toBe('unexpected number 2 (line 1, column 3)');
      expect(syntaxError('1 ? 2').message).toBe('unexpected invalid token "?" (line 1, column 3)');
    });

    it('should track lines across line breaks', () => {
      const error = syntaxError('1 +\n* 2');
      expect(error.message).toBe('unexpected "*" (line 2, column 1)');
    });

    it('should reject malformed addresses', () => {
      expect(syntaxError('A$').message).toBe('invalid cell address A$ (line 1, column 1)');
      expect(syntaxError('Sheet1!foo').message).toBe('invalid cell address foo (line 1, column 8)');
    });
  });

  // ===========================================================================
  // Grammar
  // ===========================================================================

  describe('grammar', () => {
    it('should end an expression at tokens without an infix rule', () => {
      const grammar = new Grammar().registerPrefix('number', (parser) => {
        const token = parser.next();
        return numberExpr(Number(token.literal));
      });
      expect(grammar.power('add')).toBe(BindingPower.lowest);
      expect(() => new Parser('1+2', grammar).parse()).toThrow('unexpected "+" (line 1, column 2)');
    });

    it('should expose the current and lookahead tokens', () => {
      const parser = new Parser('=sum(1)', formulaGrammar());
      expect(parser.current.literal).toBe('sum');
      expect(parser.lookahead.kind).toBe('begin-group');
    });
  });
});

describe('formatExpr', () => {
  const roundTrips: Array<[string, string]> = [
    ['1+2*3', '1 + 2 * 3'],
    ['(1+2)*3', '(1 + 2) * 3'],
    ['1-(2-3)', '1 - (2 - 3)'],
    ['2^3^2', '2 ^ 3 ^ 2'],
    ['(2^3)^2', '(2 ^ 3) ^ 2'],
    ['-(1+2)', '-(1 + 2)'],
    ['-2^2', '-2 ^ 2'],
    [`concat('a', "b")`, 'concat("a", "b")'],
    [`'it"s'`, `'it"s'`],
    ['sum($A$1:B2)', 'sum($A$1:B2)'],
    ["'My Sheet'!A1:B2", "'My Sheet'!A1:B2"],
    [`"O'Brien"!A1 + 1`, `'O''Brien'!A1 + 1`],
    [`"it's ""x"""`, `"it's ""x"""`],
  ];

  for (const [input, expected] of roundTrips) {
    it(`should render ${input} as ${expected}`, () => {
      const expr = parseFormula(input);
      expect(formatExpr(expr)).toBe(expected);
      expect(dumpExpr(parseFormula(expected))).toBe(dumpExpr(expr));
    });
  }
});

describe('cloneWithOffset', () => {
  it('should shift relative components only', () => {
    const expr = parseFormula('A1+$B$2+sum(C$3:$D4)');
    expect(formatExpr(cloneWithOffset(expr, 2, 1))).toBe('B3 + $B$2 + sum(D$3:$D6)');
  });

  it('should leave the source tree untouched', () => {
    const expr = parseFormula('A1');
    cloneWithOffset(expr, 5, 5);
    expect(formatExpr(expr)).toBe('A1');
  });

  it('should keep the sheet qualifier', () => {
    const expr = parseFormula('Data!A1');
    expect(formatExpr(cloneWithOffset(expr, 1, 0))).toBe('Data!A2');
  });
});

describe('walkExpr', () => {
  it('should visit parents before children', () => {
    const types: Expr['type'][] = [];
    walkExpr(parseFormula('sum(A1:A2, 2)'), (node) => types.push(node.type));
    expect(types).toEqual(['call', 'identifier', 'range', 'cell', 'cell', 'number']);
  });
});
