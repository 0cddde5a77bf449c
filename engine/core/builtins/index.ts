/**
 * SheetFormula Engine - Builtins Module
 */

export { createBuiltinEnvironment, builtinFunctions } from './registry.js';
export type { BuiltinOptions } from './registry.js';
export { mathFunctions } from './math.js';
export { textFunctions } from './text.js';
export { logicFunctions } from './logic.js';
export { infoFunctions } from './info.js';
export { reducerFunctions } from './reducers.js';
export { flatten, collectNumbers, collectBooleans, numberArg, textArg, scalarArg } from './helpers.js';
export type { FlatItem } from './helpers.js';
