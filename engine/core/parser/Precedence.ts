/**
 * SheetFormula Engine - Operator Precedence
 */

import type { BinaryOperator } from './Ast.js';

export const BindingPower = {
  lowest: 0,
  equality: 10,
  comparison: 20,
  concatenation: 30,
  additive: 40,
  multiplicative: 50,
  power: 60,
  unary: 70,
  call: 80,
} as const;

export type BindingPower = (typeof BindingPower)[keyof typeof BindingPower];

export interface OperatorInfo {
  power: BindingPower;
  rightAssociative: boolean;
}

export const BINARY_OPERATORS: Readonly<Record<BinaryOperator, OperatorInfo>> = {
  '=': { power: BindingPower.equality, rightAssociative: false },
  '<>': { power: BindingPower.equality, rightAssociative: false },
  '<': { power: BindingPower.comparison, rightAssociative: false },
  '<=': { power: BindingPower.comparison, rightAssociative: false },
  '>': { power: BindingPower.comparison, rightAssociative: false },
  '>=': { power: BindingPower.comparison, rightAssociative: false },
  '&': { power: BindingPower.concatenation, rightAssociative: false },
  '+': { power: BindingPower.additive, rightAssociative: false },
  '-': { power: BindingPower.additive, rightAssociative: false },
  '*': { power: BindingPower.multiplicative, rightAssociative: false },
  '/': { power: BindingPower.multiplicative, rightAssociative: false },
  '^': { power: BindingPower.power, rightAssociative: true },
};
