/**
 * SheetFormula Engine - Values Module
 */

export {
  ErrorCode,
  ERROR_CODES,
  BLANK,
  TRUE,
  FALSE,
  numberValue,
  textValue,
  booleanValue,
  dateValue,
  errorValue,
  isScalar,
  isError,
  isErrorCode,
  kindOf,
  typeName,
  formatNumber,
  formatDate,
  display,
} from './Value.js';
export type {
  BlankValue,
  NumberValue,
  TextValue,
  BooleanValue,
  DateValue,
  ErrorValue,
  ScalarValue,
  Value,
  ValueKind,
} from './Value.js';

export {
  parseNumber,
  toNumber,
  toText,
  toBool,
  equalValues,
  lessValues,
  compareValues,
  parseScalar,
} from './Coercion.js';
export type { ComparisonOperator } from './Coercion.js';

export { ArrayValue } from './ArrayValue.js';
export { ObjectValue } from './ObjectValue.js';
export { FunctionValue } from './FunctionValue.js';
export type {
  Argument,
  PredicateArgument,
  DirectImplementation,
  LazyImplementation,
  ReducerImplementation,
  FunctionMode,
  FunctionOptions,
} from './FunctionValue.js';

export { truePredicate, comparisonPredicate } from './Predicate.js';
export type { Predicate } from './Predicate.js';
