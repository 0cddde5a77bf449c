/**
 * SheetFormula Engine - Formula Calculation Engine
 *
 * Stores formulas in workbook sheets and keeps their results current:
 * - parse once, keep the tree per formula cell
 * - dependency-aware calculation order, dirty cells only
 * - cells on a reference cycle compute to #REF!
 */

import type { Position } from '../types/index.js';
import { position as makePosition } from '../types/index.js';
import type { Expr } from '../parser/Ast.js';
import { formatExpr, cloneWithOffset, walkExpr } from '../parser/Ast.js';
import { parseFormula } from '../parser/Parser.js';
import { addressKey, encodeAddress } from '../address/AddressCodec.js';
import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import { ErrorCode, errorValue, isScalar } from '../values/Value.js';
import { evaluate } from '../evaluation/Evaluator.js';
import type { Context } from '../context/Context.js';
import type { Environment } from '../context/Environment.js';
import { SheetContext } from '../context/SheetContext.js';
import { WorkbookContext } from '../context/WorkbookContext.js';
import type { MutableView, Workbook } from '../data/View.js';
import type { MemoryWorkbook } from '../data/MemoryWorkbook.js';
import { createBuiltinEnvironment } from '../builtins/registry.js';
import {
  FormulaEngineError,
  UndefinedIdentifierError,
  AddressError,
} from '../errors/index.js';
import type { AddressKey, CircularReference } from './DependencyGraph.js';
import {
  DependencyGraph,
  collectReferences,
  containsVolatileFunction,
} from './DependencyGraph.js';

export interface FormulaEngineConfig {
  /** Names visible to formulas; defaults to the builtin library */
  environment?: Environment;
  /** Dump the dependency graph and timings to the console after each recalculation */
  debug?: boolean;
}

export interface CalculationError {
  cell: AddressKey;
  error: ErrorValue;
}

export interface CalculationResult {
  success: boolean;
  calculatedCount: number;
  errors: CalculationError[];
  duration: number;
}

interface FormulaEntry {
  sheet: string;
  position: Position;
  expression: Expr;
}

/**
 * The scalar a cell stores for a formula result
 */
function toCellValue(value: Value): ScalarValue {
  if (isScalar(value)) {
    return value;
  }
  if (value.type === 'array' && value.dimension.rows > 0 && value.dimension.columns > 0) {
    return value.at(0, 0);
  }
  return errorValue(ErrorCode.value);
}

export class FormulaEngine {
  private readonly config: Required<FormulaEngineConfig>;
  private readonly dependencyGraph: DependencyGraph = new DependencyGraph();

  /** Formula cells by key */
  private readonly formulas: Map<AddressKey, FormulaEntry> = new Map();

  constructor(config: FormulaEngineConfig = {}) {
    this.config = {
      environment: config.environment ?? createBuiltinEnvironment(),
      debug: config.debug ?? false,
    };
  }

  get environment(): Environment {
    return this.config.environment;
  }

  // ===========================================================================
  // One-off Evaluation
  // ===========================================================================

  /**
   * @throws FormulaSyntaxError
   */
  parse(text: string): Expr {
    return parseFormula(text);
  }

  evaluate(expression: Expr, context: Context = this.config.environment): Value {
    return evaluate(expression, context);
  }

  /**
   * Parse and evaluate in one step
   */
  evaluateFormula(text: string, context: Context = this.config.environment): Value {
    return evaluate(parseFormula(text), context);
  }

  /**
   * Formula text as if copied `deltaRow` rows down and `deltaColumn` columns
   * right. Absolute components stay.
   * @throws AddressError when a relative reference leaves the sheet
   */
  relocateFormula(text: string, deltaRow: number, deltaColumn: number): string {
    const moved = cloneWithOffset(parseFormula(text), deltaRow, deltaColumn);
    walkExpr(moved, (node) => {
      if (node.type === 'cell' && (node.position.row < 1 || node.position.column < 1)) {
        throw new AddressError(encodeAddress(node.position), 'reference moved off the sheet');
      }
    });
    return `=${formatExpr(moved)}`;
  }

  // ===========================================================================
  // Formula Management
  // ===========================================================================

  /**
   * Store a formula and register its dependencies. Nothing is computed until
   * `recalculate`.
   * @returns the cycle the formula closes, or null
   * @throws FormulaSyntaxError before anything is stored
   */
  setFormula(workbook: Workbook, sheet: string, position: Position, text: string): CircularReference | null {
    const expression = parseFormula(text);
    const view = this.requireSheet(workbook, sheet);
    const local = makePosition(position.column, position.row);
    const key = addressKey(local, sheet);

    view.setFormula(local, text);
    this.formulas.set(key, { sheet, position: local, expression });

    const cycle = this.dependencyGraph.setDependencies(
      key,
      collectReferences(expression, sheet),
      containsVolatileFunction(expression, this.config.environment)
    );
    this.dependencyGraph.markDirty(key);
    return cycle;
  }

  /**
   * Store a constant, dropping any formula the cell held
   */
  setValue(workbook: Workbook, sheet: string, position: Position, value: ScalarValue): void {
    const view = this.requireSheet(workbook, sheet);
    const local = makePosition(position.column, position.row);
    const key = addressKey(local, sheet);

    view.setValue(local, value);
    this.forget(key);
    this.dependencyGraph.markDirty(key);
  }

  removeFormula(workbook: Workbook, sheet: string, position: Position): void {
    const view = this.requireSheet(workbook, sheet);
    const local = makePosition(position.column, position.row);
    const key = addressKey(local, sheet);

    view.clearCell(local);
    this.forget(key);
    this.dependencyGraph.markDirty(key);
  }

  /**
   * Copy the formula at `source` to `target` on the same sheet, shifting its
   * relative references
   */
  copyFormula(workbook: Workbook, sheet: string, source: Position, target: Position): CircularReference | null {
    const entry = this.formulas.get(addressKey(makePosition(source.column, source.row), sheet));
    if (entry === undefined) {
      throw new FormulaEngineError(`${sheet}!${encodeAddress(makePosition(source.column, source.row))}: no formula`);
    }
    const text = this.relocateFormula(
      formatExpr(entry.expression),
      target.row - source.row,
      target.column - source.column
    );
    return this.setFormula(workbook, sheet, target, text);
  }

  /**
   * Register every formula already stored in the workbook's sheets, such as
   * input entered with `setInput('=...')`
   * @returns the cycles found while registering
   */
  loadWorkbook(workbook: MemoryWorkbook): CircularReference[] {
    const cycles: CircularReference[] = [];
    for (const name of workbook.sheetNames()) {
      const view = workbook.sheet(name);
      if (view === null) continue;

      for (const { position, formula } of [...view.formulaCells()]) {
        const cycle = this.setFormula(workbook, name, position, formula);
        if (cycle) cycles.push(cycle);
      }
    }
    return cycles;
  }

  hasFormula(sheet: string, position: Position): boolean {
    return this.formulas.has(addressKey(makePosition(position.column, position.row), sheet));
  }

  markDirty(sheet: string, position: Position): void {
    this.dependencyGraph.markDirty(addressKey(makePosition(position.column, position.row), sheet));
  }

  private forget(key: AddressKey): void {
    if (this.formulas.delete(key)) {
      this.dependencyGraph.removeDependencies(key);
    }
  }

  private requireSheet(workbook: Workbook, sheet: string): MutableView {
    const view = workbook.sheet(sheet);
    if (view === null) {
      throw new FormulaEngineError(`Sheet ${sheet} does not exist`);
    }
    return view.mutable();
  }

  // ===========================================================================
  // Calculation
  // ===========================================================================

  /**
   * Calculate all dirty cells (and volatile ones) in dependency order
   */
  recalculate(workbook: Workbook): CalculationResult {
    const startTime = performance.now();
    const errors: CalculationError[] = [];
    const context = new WorkbookContext(workbook, this.config.environment);

    this.dependencyGraph.markVolatileDirty();
    const order = this.dependencyGraph.getCalculationOrder();
    const circular = new Set(this.dependencyGraph.getCircularCells());

    let calculatedCount = 0;
    for (const key of order) {
      const entry = this.formulas.get(key);
      if (entry === undefined) continue;

      const error = this.calculateCell(key, entry, workbook, context, circular.has(key));
      calculatedCount++;
      if (error) {
        errors.push({ cell: key, error });
      }
    }

    this.dependencyGraph.clearAllDirty();

    const result = {
      success: errors.length === 0,
      calculatedCount,
      errors,
      duration: performance.now() - startTime,
    };

    if (this.config.debug) {
      console.log(`[FormulaEngine] calculated ${calculatedCount} cell(s) in ${result.duration.toFixed(2)}ms`);
      for (const { cell, error } of errors) {
        console.log(`  ${cell}: ${error.code}${error.message ? ` (${error.message})` : ''}`);
      }
      this.dependencyGraph.debug();
    }

    return result;
  }

  /**
   * Evaluate one formula cell and store its result
   */
  private calculateCell(
    key: AddressKey,
    entry: FormulaEntry,
    workbook: Workbook,
    parent: Context,
    onCycle: boolean
  ): ErrorValue | null {
    const view = workbook.sheet(entry.sheet);
    if (view === null) {
      this.forget(key);
      return null;
    }

    let result: ScalarValue;
    if (onCycle) {
      result = errorValue(ErrorCode.ref, 'circular reference');
    } else {
      result = this.evaluateCell(entry, new SheetContext(view, parent));
    }

    view.mutable().setResult(entry.position, result);
    return result.type === 'error' ? result : null;
  }

  private evaluateCell(entry: FormulaEntry, context: Context): ScalarValue {
    try {
      return toCellValue(evaluate(entry.expression, context));
    } catch (error) {
      if (error instanceof UndefinedIdentifierError) {
        return errorValue(ErrorCode.name, error.message);
      }
      if (error instanceof FormulaEngineError) {
        return errorValue(ErrorCode.value, error.message);
      }
      throw error;
    }
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  /**
   * Get the dependency graph (for debugging/visualization)
   */
  getDependencyGraph(): DependencyGraph {
    return this.dependencyGraph;
  }

  getStats(): {
    formulaCells: number;
    graphStats: ReturnType<DependencyGraph['getStats']>;
  } {
    return {
      formulaCells: this.formulas.size,
      graphStats: this.dependencyGraph.getStats(),
    };
  }

  clear(): void {
    this.formulas.clear();
    this.dependencyGraph.clear();
  }
}
