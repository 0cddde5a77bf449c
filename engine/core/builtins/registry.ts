/**
 * SheetFormula Engine - Builtin Registry
 */

import { TRUE, FALSE } from '../values/Value.js';
import type { FunctionValue } from '../values/FunctionValue.js';
import type { Context } from '../context/Context.js';
import { Environment } from '../context/Environment.js';
import { mathFunctions } from './math.js';
import { textFunctions } from './text.js';
import { logicFunctions } from './logic.js';
import { infoFunctions } from './info.js';
import { reducerFunctions } from './reducers.js';

export interface BuiltinOptions {
  /** Source for rand(); defaults to Math.random */
  random?: () => number;
  /** Milliseconds since the epoch for now(); defaults to Date.now */
  clock?: () => number;
  /** Enclosing scope for names the builtins do not bind */
  parent?: Context;
}

export function builtinFunctions(options: BuiltinOptions = {}): FunctionValue[] {
  const random = options.random ?? Math.random;
  const clock = options.clock ?? Date.now;
  return [
    ...mathFunctions(random, clock),
    ...textFunctions(),
    ...logicFunctions(),
    ...infoFunctions(),
    ...reducerFunctions(),
  ];
}

/**
 * An environment holding the boolean constants and every builtin function,
 * each under its lower and upper case name
 */
export function createBuiltinEnvironment(options: BuiltinOptions = {}): Environment {
  const env = new Environment(options.parent);
  env.define('true', TRUE).define('TRUE', TRUE);
  env.define('false', FALSE).define('FALSE', FALSE);

  for (const fn of builtinFunctions(options)) {
    env.define(fn.name, fn);
    env.define(fn.name.toUpperCase(), fn);
  }
  return env;
}
