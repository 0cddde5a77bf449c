/**
 * SheetFormula Engine - Formula Module Exports
 */

export { DependencyGraph, collectReferences, containsVolatileFunction } from './DependencyGraph.js';
export type { AddressKey, DependencyInfo, CircularReference } from './DependencyGraph.js';

export { FormulaEngine } from './FormulaEngine.js';
export type { FormulaEngineConfig, CalculationError, CalculationResult } from './FormulaEngine.js';
