/**
 * SheetFormula Engine - Predicates
 *
 * Cell filters handed to reducer functions (`countif(A1:A9 > 2)`).
 */

import type { ScalarValue } from './Value.js';
import type { ComparisonOperator } from './Coercion.js';
import { compareValues } from './Coercion.js';
import { IncompatibleValuesError } from '../errors/index.js';

export type Predicate = (value: ScalarValue) => boolean;

export const truePredicate: Predicate = () => true;

/**
 * Match cells for which `cell <operator> operand` holds. A cell of another
 * variant than the operand does not match.
 */
export function comparisonPredicate(operator: ComparisonOperator, operand: ScalarValue): Predicate {
  return (value) => {
    if (value.type === 'error') {
      return false;
    }
    try {
      return compareValues(operator, value, operand);
    } catch (error) {
      if (error instanceof IncompatibleValuesError) return false;
      throw error;
    }
  };
}
