/**
 * SheetFormula Engine - Function Values
 *
 * Callables bound in an environment. Three calling conventions:
 * - direct: receives the evaluated arguments
 * - lazy: receives the unevaluated arguments and decides what to evaluate
 * - reducer: receives one predicate and one source value, so that
 *   `countif(A1:A9 > 2)` filters instead of comparing the whole range
 */

import type { Value } from './Value.js';
import type { Predicate } from './Predicate.js';
import { truePredicate } from './Predicate.js';
import type { Context } from '../context/Context.js';
import { ArityError } from '../errors/index.js';

/**
 * A call argument as the callee sees it
 */
export interface Argument {
  readonly kind: 'expr' | 'value';
  evaluate(context: Context): Value;
  /** Split `source <op> operand` into a filter, or null if it is not one */
  tryAsPredicate(context: Context): PredicateArgument | null;
}

export interface PredicateArgument {
  predicate: Predicate;
  source: Value;
}

export type DirectImplementation = (args: Value[]) => Value;
export type LazyImplementation = (args: readonly Argument[], context: Context) => Value;
export type ReducerImplementation = (predicate: Predicate, source: Value) => Value;

export type FunctionMode = 'direct' | 'lazy' | 'reducer';

type Behavior =
  | { mode: 'direct'; fn: DirectImplementation }
  | { mode: 'lazy'; fn: LazyImplementation }
  | { mode: 'reducer'; fn: ReducerImplementation };

export interface FunctionOptions {
  minArgs?: number;
  maxArgs?: number;
  /** Result may change without any input changing (now, rand) */
  volatile?: boolean;
}

export class FunctionValue {
  readonly type = 'function' as const;

  readonly name: string;
  readonly minArgs: number;
  readonly maxArgs: number;
  readonly volatile: boolean;

  private readonly behavior: Behavior;

  private constructor(name: string, behavior: Behavior, options: FunctionOptions) {
    this.name = name;
    this.behavior = behavior;
    this.minArgs = options.minArgs ?? 0;
    this.maxArgs = options.maxArgs ?? Infinity;
    this.volatile = options.volatile ?? false;
  }

  static direct(name: string, fn: DirectImplementation, options: FunctionOptions = {}): FunctionValue {
    return new FunctionValue(name, { mode: 'direct', fn }, options);
  }

  static lazy(name: string, fn: LazyImplementation, options: FunctionOptions = {}): FunctionValue {
    return new FunctionValue(name, { mode: 'lazy', fn }, options);
  }

  static reducer(name: string, fn: ReducerImplementation): FunctionValue {
    return new FunctionValue(name, { mode: 'reducer', fn }, { minArgs: 1, maxArgs: 1 });
  }

  get mode(): FunctionMode {
    return this.behavior.mode;
  }

  get typeName(): string {
    return 'function';
  }

  /**
   * @throws ArityError when the argument count is outside [minArgs, maxArgs]
   */
  call(args: readonly Argument[], context: Context): Value {
    this.checkArity(args.length);

    const behavior = this.behavior;
    switch (behavior.mode) {
      case 'direct':
        return behavior.fn(args.map((arg) => arg.evaluate(context)));
      case 'lazy':
        return behavior.fn(args, context);
      case 'reducer': {
        const [arg] = args;
        const filter = arg.tryAsPredicate(context);
        if (filter !== null) {
          return behavior.fn(filter.predicate, filter.source);
        }
        return behavior.fn(truePredicate, arg.evaluate(context));
      }
    }
  }

  private checkArity(count: number): void {
    if (count >= this.minArgs && count <= this.maxArgs) {
      return;
    }

    let expected: string;
    if (this.minArgs === this.maxArgs) {
      expected = String(this.minArgs);
    } else if (this.maxArgs === Infinity) {
      expected = `at least ${this.minArgs}`;
    } else {
      expected = `${this.minArgs} to ${this.maxArgs}`;
    }
    throw new ArityError(this.name, expected, count);
  }

  toString(): string {
    return `${this.name}()`;
  }
}
