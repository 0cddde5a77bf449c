/**
 * SheetFormula Engine - Logical Builtins
 */

import type { Value } from '../values/Value.js';
import { FALSE, booleanValue } from '../values/Value.js';
import { toBool } from '../values/Coercion.js';
import { FunctionValue } from '../values/FunctionValue.js';
import type { Argument } from '../values/FunctionValue.js';
import type { Context } from '../context/Context.js';
import { collectBooleans, isErrorValue } from './helpers.js';

/**
 * if(condition, then[, else]); only the chosen branch is evaluated
 */
function ifThenElse(args: readonly Argument[], context: Context): Value {
  const condition = toBool(args[0].evaluate(context));
  if (condition.type === 'error') return condition;

  if (condition.value) {
    return args[1].evaluate(context);
  }
  return args.length > 2 ? args[2].evaluate(context) : FALSE;
}

function fold(combine: (flags: boolean[]) => boolean) {
  return (args: Value[]): Value => {
    const flags = collectBooleans(args);
    if (isErrorValue(flags)) return flags;
    return booleanValue(combine(flags));
  };
}

function not(args: Value[]): Value {
  const flag = toBool(args[0]);
  if (flag.type === 'error') return flag;
  return booleanValue(!flag.value);
}

export function logicFunctions(): FunctionValue[] {
  return [
    FunctionValue.lazy('if', ifThenElse, { minArgs: 2, maxArgs: 3 }),
    FunctionValue.direct('and', fold((flags) => flags.every(Boolean)), { minArgs: 1 }),
    FunctionValue.direct('or', fold((flags) => flags.some(Boolean)), { minArgs: 1 }),
    FunctionValue.direct('xor', fold((flags) => flags.filter(Boolean).length % 2 === 1), { minArgs: 1 }),
    FunctionValue.direct('not', not, { minArgs: 1, maxArgs: 1 }),
  ];
}
