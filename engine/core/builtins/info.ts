/**
 * SheetFormula Engine - Information Builtins
 */

import type { Value, ScalarValue } from '../values/Value.js';
import { ErrorCode, textValue, booleanValue, errorValue, typeName } from '../values/Value.js';
import { FunctionValue } from '../values/FunctionValue.js';
import { PropertyError } from '../errors/index.js';
import { scalarArg, textArg, isErrorValue } from './helpers.js';

function is(test: (value: ScalarValue) => boolean) {
  return (args: Value[]): Value => {
    const value = scalarArg(args[0]);
    return booleanValue(value !== null && test(value));
  };
}

/**
 * get(object, property): a property of an object value, #VALUE! for
 * anything that is not an object
 */
function get(args: Value[]): Value {
  const [target, property] = args;
  if (target.type !== 'object') {
    return errorValue(ErrorCode.value);
  }
  const name = textArg(property);
  if (isErrorValue(name)) return name;
  if (!target.has(name)) {
    throw new PropertyError(name);
  }
  return target.get(name);
}

export function infoFunctions(): FunctionValue[] {
  return [
    FunctionValue.direct('typeof', (args) => textValue(typeName(args[0])), { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('isnumber', is((v) => v.type === 'number'), { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('istext', is((v) => v.type === 'text'), { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('iserror', is((v) => v.type === 'error'), { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('isblank', is((v) => v.type === 'blank'), { minArgs: 1, maxArgs: 1 }),
    FunctionValue.direct('get', get, { minArgs: 2, maxArgs: 2 }),
  ];
}
