/**
 * SheetFormula Engine - Evaluation Module
 */

export { evaluate, applyBinary } from './Evaluator.js';
export { ExprArgument, ValueArgument } from './Argument.js';
