/**
 * SheetFormula Engine - Evaluator Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { evaluate, applyBinary } from './Evaluator.js';
import { ExprArgument, ValueArgument } from './Argument.js';
import { parseFormula } from '../parser/Parser.js';
import { numberValue, textValue, errorValue, display, ErrorCode, BLANK } from '../values/Value.js';
import type { Value } from '../values/Value.js';
import { FunctionValue } from '../values/FunctionValue.js';
import { Environment } from '../context/Environment.js';
import { WorkbookContext } from '../context/WorkbookContext.js';
import { MemoryWorkbook } from '../data/MemoryWorkbook.js';
import { decodeAddress } from '../address/AddressCodec.js';
import { createBuiltinEnvironment } from '../builtins/registry.js';
import {
  NotCallableError,
  UndefinedIdentifierError,
  ArityError,
} from '../errors/index.js';

describe('Evaluator', () => {
  let env: Environment;
  let context: WorkbookContext;

  function run(text: string): string {
    return display(evaluate(parseFormula(text), context));
  }

  beforeEach(() => {
    const book = new MemoryWorkbook();
    const sheet = book.addSheet('Sheet1');
    sheet.setInput(decodeAddress('A1'), '1');
    sheet.setInput(decodeAddress('A2'), '2');
    sheet.setInput(decodeAddress('A3'), '3');
    sheet.setInput(decodeAddress('B1'), 'apple');
    sheet.setInput(decodeAddress('B2'), 'pear');

    const other = book.addSheet('Sheet2');
    other.setInput(decodeAddress('A1'), '10');

    env = createBuiltinEnvironment({ random: () => 0.25, clock: () => 0 });
    context = new WorkbookContext(book, env);
  });

  // ===========================================================================
  // Operators
  // ===========================================================================

  describe('operators', () => {
    it('should add numbers', () => {
      expect(run('1+1')).toBe('2');
    });

    it('should concatenate text', () => {
      expect(run("'foo' & 'bar'")).toBe('foobar');
      expect(run('1 & 2')).toBe('12');
    });

    it('should raise to powers right to left', () => {
      expect(run('2^3^2')).toBe('512');
      expect(run('-2^2')).toBe('4');
    });

    it('should compare values of the same kind', () => {
      expect(run('1 < 2')).toBe('true');
      expect(run('"b" >= "a"')).toBe('true');
      expect(run('2 <> 2')).toBe('false');
    });

    it('should refuse to compare different kinds', () => {
      const result = evaluate(parseFormula('1 = "1"'), context);
      expect(result).toEqual(errorValue(ErrorCode.value, 'number and text can not be compared'));
    });

    it('should compare a blank cell as zero', () => {
      expect(run('Z99 = 0')).toBe('true');
      expect(run('Z99 = ""')).toBe('true');
    });

    it('should report division by zero', () => {
      expect(run('1/0')).toBe('#DIV/0!');
    });

    it('should report non-finite results', () => {
      expect(run('10^400')).toBe('#NUM!');
    });

    it('should propagate the left error first', () => {
      expect(run('sqrt(-1) + 1/0')).toBe('#NUM!');
      expect(run('1 + 1/0')).toBe('#DIV/0!');
    });

    it('should not evaluate the right operand after a left error', () => {
      const result = evaluate(parseFormula('1/0 + missing'), new Environment());
      expect(result).toEqual(errorValue(ErrorCode.divideByZero));
      expect(() => run('1 + missing')).toThrow(UndefinedIdentifierError);
    });

    it('should reject negating text', () => {
      expect(run('-"a"')).toBe('#VALUE!');
    });
  });

  // ===========================================================================
  // References
  // ===========================================================================

  describe('references', () => {
    it('should read cells of the active sheet', () => {
      expect(run('A1 + A3')).toBe('4');
      expect(run('B1')).toBe('apple');
    });

    it('should read blank cells as blank', () => {
      expect(evaluate(parseFormula('C7'), context)).toBe(BLANK);
      expect(run('C7 + 1')).toBe('1');
    });

    it('should read other sheets', () => {
      expect(run('Sheet2!A1 * 2')).toBe('20');
    });

    it('should report unknown sheets', () => {
      expect(run('Nowhere!A1')).toBe('#REF!');
    });

    it('should read ranges independent of corner order', () => {
      expect(run('sum(A1:A3)')).toBe('6');
      expect(run('sum(A3:A1)')).toBe('6');
      expect(run('A1:B2')).toBe('{1, apple; 2, pear}');
    });

    it('should broadcast operators over ranges', () => {
      expect(run('A1:A3 * 2')).toBe('{2; 4; 6}');
      expect(run('-A1:A2')).toBe('{-1; -2}');
    });
  });

  // ===========================================================================
  // Calls
  // ===========================================================================

  describe('calls', () => {
    it('should call functions bound in the environment', () => {
      env.define('one', FunctionValue.direct('one', () => numberValue(1)));
      expect(run('one()')).toBe('1');
    });

    it('should resolve builtins in either case', () => {
      expect(run('SUM(1, 2)')).toBe('3');
      expect(run('TRUE')).toBe('true');
    });

    it('should evaluate only the chosen branch of if', () => {
      let calls = 0;
      env.define('boom', FunctionValue.direct('boom', () => {
        calls++;
        return errorValue(ErrorCode.na);
      }));
      expect(run('if(A1 = 1, "yes", boom())')).toBe('yes');
      expect(run('if(A1 = 2, "yes", boom())')).toBe('#N/A');
      expect(calls).toBe(1);
    });

    it('should hand comparisons to reducers as filters', () => {
      expect(run('countif(A1:A3 > 1)')).toBe('2');
      expect(run('sumif(A1:A3 >= 2)')).toBe('5');
      expect(run('countif(A1:B3)')).toBe('5');
    });

    it('should yield #NAME? for a callee that is not a name', () => {
      expect(run('(1)(2)')).toBe('#NAME?');
    });

    it('should refuse to call values that are not functions', () => {
      env.define('x', numberValue(1));
      expect(() => run('x(1)')).toThrow(NotCallableError);
      expect(() => run('x(1)')).toThrow('x: expression is not callable');
    });

    it('should throw on undefined names', () => {
      expect(() => run('nope + 1')).toThrow(UndefinedIdentifierError);
    });

    it('should check arity', () => {
      expect(() => run('not(1, 2)')).toThrow(ArityError);
      expect(() => run('not(1, 2)')).toThrow('not: expected 1 argument(s), got 2');
    });
  });
});

describe('applyBinary', () => {
  it('should combine scalars', () => {
    expect(applyBinary('*', numberValue(6), numberValue(7))).toEqual(numberValue(42));
    expect(applyBinary('&', textValue('a'), numberValue(1))).toEqual(textValue('a1'));
  });

  it('should return the left error unchanged', () => {
    const left = errorValue(ErrorCode.ref);
    expect(applyBinary('+', left, errorValue(ErrorCode.na))).toBe(left);
  });
});

describe('Argument', () => {
  const env = new Environment();

  it('should return wrapped values as they are', () => {
    const value: Value = textValue('x');
    const arg = new ValueArgument(value);
    expect(arg.evaluate(env)).toBe(value);
    expect(arg.tryAsPredicate(env)).toBeNull();
  });

  it('should split comparisons into a predicate and a source', () => {
    const arg = new ExprArgument(parseFormula('5 > 3'));
    const filter = arg.tryAsPredicate(env);
    expect(filter?.source).toEqual(numberValue(5));
    expect(filter?.predicate(numberValue(4))).toBe(true);
    expect(filter?.predicate(numberValue(2))).toBe(false);
    expect(filter?.predicate(textValue('4'))).toBe(false);
  });

  it('should not split other expressions', () => {
    expect(new ExprArgument(parseFormula('5 + 3')).tryAsPredicate(env)).toBeNull();
  });

  it('should let host code call functions with known values', () => {
    const sum = FunctionValue.direct('sum', (args) => numberValue(args.length));
    expect(sum.call([new ValueArgument(numberValue(1)), new ValueArgument(BLANK)], env)).toEqual(numberValue(2));
  });
});
