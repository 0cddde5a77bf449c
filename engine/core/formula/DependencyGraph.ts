/**
 * SheetFormula Engine - Formula Dependency Graph
 *
 * Directed graph of formula dependencies between sheet-qualified cells,
 * used for incremental recalculation: only dirty cells are recalculated.
 *
 * - Track which cells depend on which other cells
 * - Detect circular references
 * - Topological sort for calculation order
 * - Incremental dirty marking
 */

import type { CellRange } from '../types/index.js';
import type { Expr } from '../parser/Ast.js';
import { walkExpr } from '../parser/Ast.js';
import { addressKey, normalizeRange } from '../address/AddressCodec.js';
import type { Context } from '../context/Context.js';
import { ResolutionError } from '../errors/index.js';

/** Sheet-qualified address without `$` markers: "Sheet1!B2" */
export type AddressKey = string;

export interface DependencyInfo {
  /** Cells that this cell's formula references */
  precedents: Set<AddressKey>;
  /** Cells that reference this cell in their formulas */
  dependents: Set<AddressKey>;
}

export interface CircularReference {
  type: 'circular';
  cells: AddressKey[];
  message: string;
}

export class DependencyGraph {
  private graph: Map<AddressKey, DependencyInfo> = new Map();

  /** Cells that need recalculation */
  private dirtyCells: Set<AddressKey> = new Set();

  /** Cells whose formula calls a volatile function (always recalculate) */
  private volatileCells: Set<AddressKey> = new Set();

  // ===========================================================================
  // Dependency Management
  // ===========================================================================

  /**
   * Replace the dependencies of a formula cell
   * @returns the cycle the new dependencies close, or null
   */
  setDependencies(
    cell: AddressKey,
    precedents: AddressKey[],
    isVolatile: boolean = false
  ): CircularReference | null {
    this.removeDependencies(cell);

    const info = this.graph.get(cell) ?? { precedents: new Set(), dependents: new Set() };
    for (const precedent of precedents) {
      info.precedents.add(precedent);
    }
    this.graph.set(cell, info);

    for (const precedent of precedents) {
      let precedentInfo = this.graph.get(precedent);
      if (!precedentInfo) {
        precedentInfo = { precedents: new Set(), dependents: new Set() };
        this.graph.set(precedent, precedentInfo);
      }
      precedentInfo.dependents.add(cell);
    }

    if (isVolatile) {
      this.volatileCells.add(cell);
    }

    const cycle = this.detectCycle(cell);
    if (cycle) {
      const message = cycle.length === 1
        ? `Cell ${cell} contains a circular reference to itself`
        : `Circular reference detected: ${cycle.join(' -> ')}`;
      return { type: 'circular', cells: cycle, message };
    }
    return null;
  }

  /**
   * Remove all dependencies of a cell (when its formula is deleted)
   */
  removeDependencies(cell: AddressKey): void {
    const info = this.graph.get(cell);
    this.volatileCells.delete(cell);
    if (!info) return;

    for (const precedent of info.precedents) {
      const precedentInfo = this.graph.get(precedent);
      if (precedentInfo) {
        precedentInfo.dependents.delete(cell);
        if (precedentInfo.precedents.size === 0 && precedentInfo.dependents.size === 0) {
          this.graph.delete(precedent);
        }
      }
    }

    // Dependents stay: other formulas still read this cell
    info.precedents.clear();
    if (info.dependents.size === 0) {
      this.graph.delete(cell);
    }
  }

  getPrecedents(cell: AddressKey): AddressKey[] {
    return Array.from(this.graph.get(cell)?.precedents ?? []);
  }

  getDependents(cell: AddressKey): AddressKey[] {
    return Array.from(this.graph.get(cell)?.dependents ?? []);
  }

  /**
   * All dependents, transitively, in breadth-first order
   */
  getAllDependents(cell: AddressKey): AddressKey[] {
    const visited = new Set<AddressKey>();
    const result: AddressKey[] = [];
    const queue = this.getDependents(cell);

    for (let i = 0; i < queue.length; i++) {
      const current = queue[i];
      if (visited.has(current)) continue;

      visited.add(current);
      result.push(current);
      queue.push(...this.getDependents(current));
    }

    return result;
  }

  // ===========================================================================
  // Dirty Tracking & Calculation Order
  // ===========================================================================

  /**
   * Mark a cell and all its dependents as dirty
   */
  markDirty(cell: AddressKey): void {
    this.dirtyCells.add(cell);
    for (const dependent of this.getAllDependents(cell)) {
      this.dirtyCells.add(dependent);
    }
  }

  markRangeDirty(range: CellRange, sheet: string): void {
    for (const key of expandRange(range, sheet)) {
      this.markDirty(key);
    }
  }

  markVolatileDirty(): void {
    for (const cell of this.volatileCells) {
      this.markDirty(cell);
    }
  }

  isDirty(cell: AddressKey): boolean {
    return this.dirtyCells.has(cell);
  }

  getDirtyCells(): AddressKey[] {
    return Array.from(this.dirtyCells);
  }

  /**
   * Dirty cells in calculation order (topological sort). Cells on a cycle
   * come as soon as nothing outside their cycle holds them back, so that
   * cells downstream of a cycle still get an order.
   */
  getCalculationOrder(): AddressKey[] {
    const dirty = new Set(this.dirtyCells);
    const circular = new Set(this.getCircularCells());
    const result: AddressKey[] = [];
    const inDegree = new Map<AddressKey, number>();

    for (const cell of dirty) {
      let count = 0;
      if (!circular.has(cell)) {
        for (const precedent of this.getPrecedents(cell)) {
          if (dirty.has(precedent)) count++;
        }
      }
      inDegree.set(cell, count);
    }

    const queue: AddressKey[] = [];
    for (const [cell, degree] of inDegree) {
      if (degree === 0) queue.push(cell);
    }

    for (let i = 0; i < queue.length; i++) {
      const cell = queue[i];
      result.push(cell);

      for (const dependent of this.getDependents(cell)) {
        if (!dirty.has(dependent) || circular.has(dependent)) continue;
        const degree = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, degree);
        if (degree === 0) queue.push(dependent);
      }
    }

    return result;
  }

  clearAllDirty(): void {
    this.dirtyCells.clear();
  }

  // ===========================================================================
  // Circular Reference Detection
  // ===========================================================================

  /**
   * Depth-first search along precedents
   * @returns the cells of the first cycle found, or null
   */
  private detectCycle(startCell: AddressKey): AddressKey[] | null {
    const visited = new Set<AddressKey>();
    const recursionStack = new Set<AddressKey>();
    const path: AddressKey[] = [];

    const dfs = (cell: AddressKey): AddressKey[] | null => {
      visited.add(cell);
      recursionStack.add(cell);
      path.push(cell);

      const info = this.graph.get(cell);
      if (info) {
        for (const precedent of info.precedents) {
          if (!visited.has(precedent)) {
            const cycle = dfs(precedent);
            if (cycle) return cycle;
          } else if (recursionStack.has(precedent)) {
            return path.slice(path.indexOf(precedent));
          }
        }
      }

      path.pop();
      recursionStack.delete(cell);
      return null;
    };

    return dfs(startCell);
  }

  /**
   * Whether the cell can reach itself through its precedents
   */
  hasCircularReference(cell: AddressKey): boolean {
    const visited = new Set<AddressKey>();
    const stack = this.getPrecedents(cell);

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (current === cell) return true;
      if (visited.has(current)) continue;
      visited.add(current);
      stack.push(...this.getPrecedents(current));
    }
    return false;
  }

  /**
   * Every cell on a cycle, found in one pass over the graph: the members of
   * strongly connected components with more than one cell, and cells that
   * reference themselves (Tarjan, iterative)
   */
  getCircularCells(): AddressKey[] {
    const index = new Map<AddressKey, number>();
    const low = new Map<AddressKey, number>();
    const onStack = new Set<AddressKey>();
    const stack: AddressKey[] = [];
    const circular: AddressKey[] = [];
    let counter = 0;

    const work: Array<{ cell: AddressKey; precedents: Iterator<AddressKey> }> = [];
    const enter = (cell: AddressKey): void => {
      index.set(cell, counter);
      low.set(cell, counter);
      counter++;
      stack.push(cell);
      onStack.add(cell);
      const precedents = this.graph.get(cell)?.precedents ?? new Set<AddressKey>();
      work.push({ cell, precedents: precedents.values() });
    };
    const lowOf = (cell: AddressKey): number => low.get(cell) ?? 0;

    for (const root of this.graph.keys()) {
      if (index.has(root)) continue;
      enter(root);

      while (work.length > 0) {
        const frame = work[work.length - 1];
        const step = frame.precedents.next();
        if (!step.done) {
          const precedent = step.value;
          if (!index.has(precedent)) {
            enter(precedent);
          } else if (onStack.has(precedent)) {
            low.set(frame.cell, Math.min(lowOf(frame.cell), index.get(precedent) ?? 0));
          }
          continue;
        }

        work.pop();
        if (work.length > 0) {
          const parent = work[work.length - 1].cell;
          low.set(parent, Math.min(lowOf(parent), lowOf(frame.cell)));
        }
        if (lowOf(frame.cell) !== index.get(frame.cell)) continue;

        const component: AddressKey[] = [];
        for (;;) {
          const member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
          if (member === frame.cell) break;
        }
        const selfReference = this.graph.get(frame.cell)?.precedents.has(frame.cell) ?? false;
        if (component.length > 1 || selfReference) {
          circular.push(...component);
        }
      }
    }

    return circular;
  }

  // ===========================================================================
  // Volatile Functions
  // ===========================================================================

  getVolatileCells(): AddressKey[] {
    return Array.from(this.volatileCells);
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  clear(): void {
    this.graph.clear();
    this.dirtyCells.clear();
    this.volatileCells.clear();
  }

  getStats(): {
    totalCells: number;
    totalEdges: number;
    dirtyCells: number;
    circularCells: number;
    volatileCells: number;
  } {
    let totalEdges = 0;
    for (const info of this.graph.values()) {
      totalEdges += info.precedents.size;
    }

    return {
      totalCells: this.graph.size,
      totalEdges,
      dirtyCells: this.dirtyCells.size,
      circularCells: this.getCircularCells().length,
      volatileCells: this.volatileCells.size,
    };
  }

  /**
   * Debug: Print the graph
   */
  debug(): void {
    console.log('=== Dependency Graph ===');
    for (const [cell, info] of this.graph) {
      console.log(`${cell}:`);
      console.log(`  Precedents: ${Array.from(info.precedents).join(', ') || 'none'}`);
      console.log(`  Dependents: ${Array.from(info.dependents).join(', ') || 'none'}`);
    }
    console.log(`Dirty cells: ${Array.from(this.dirtyCells).join(', ') || 'none'}`);
    console.log(`Circular cells: ${this.getCircularCells().join(', ') || 'none'}`);
    console.log(`Volatile cells: ${Array.from(this.volatileCells).join(', ') || 'none'}`);
  }
}

// ===========================================================================
// Reference Extraction
// ===========================================================================

function expandRange(range: CellRange, sheet: string): AddressKey[] {
  const { start, end } = normalizeRange(range);
  const keys: AddressKey[] = [];
  for (let row = Math.max(start.row, 1); row <= end.row; row++) {
    for (let column = Math.max(start.column, 1); column <= end.column; column++) {
      keys.push(addressKey({ ...start, row, column }, sheet));
    }
  }
  return keys;
}

/**
 * Cells an expression reads, as keys qualified with `sheet` where the
 * reference names no sheet. Ranges expand to every cell they cover.
 */
export function collectReferences(expr: Expr, sheet: string): AddressKey[] {
  const references = new Set<AddressKey>();

  walkExpr(expr, (node) => {
    if (node.type === 'range') {
      for (const key of expandRange({ start: node.start.position, end: node.end.position }, sheet)) {
        references.add(key);
      }
    } else if (node.type === 'cell' && node.position.row >= 1 && node.position.column >= 1) {
      references.add(addressKey(node.position, sheet));
    }
  });

  return [...references];
}

/**
 * Whether the expression calls a function flagged volatile (now, rand).
 * Callees the context cannot resolve are not volatile.
 */
export function containsVolatileFunction(expr: Expr, context: Context): boolean {
  let volatile = false;

  walkExpr(expr, (node) => {
    if (volatile || node.type !== 'call' || node.callee.type !== 'identifier') return;
    try {
      const callee = context.resolve(node.callee.name);
      volatile = callee.type === 'function' && callee.volatile;
    } catch (error) {
      if (!(error instanceof ResolutionError)) throw error;
    }
  });

  return volatile;
}
