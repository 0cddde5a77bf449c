/**
 * SheetFormula Engine - Scope Stack
 *
 * A context made of stacked scopes, searched from the top down. A scope that
 * cannot serve a lookup (ResolutionError) is skipped; any other error stops
 * the search.
 *
 * Every push hands back a guard that truncates the stack to the depth it had
 * before the push, as long as its own scope is still at that depth.
 * `withScope` restores on every exit path, errors included.
 */

import type { Position } from '../types/index.js';
import type { Value, ScalarValue, ErrorValue } from '../values/Value.js';
import type { ArrayValue } from '../values/ArrayValue.js';
import type { AddressableView } from '../data/View.js';
import type { Context } from './Context.js';
import { SheetContext, WritableSheetContext, isWritable } from './SheetContext.js';
import {
  ResolutionError,
  UndefinedIdentifierError,
  NotAvailableError,
  ReadOnlyError,
} from '../errors/index.js';

export interface ScopeGuard {
  /** Stack depth before the push */
  readonly depth: number;
  /**
   * Truncate back to `depth`. Does nothing once called, or once the pushed
   * scope has been popped by an outer guard.
   */
  restore(): void;
}

export class ScopeStack implements Context {
  private readonly scopes: Context[] = [];

  constructor(...base: Context[]) {
    this.scopes.push(...base);
  }

  get depth(): number {
    return this.scopes.length;
  }

  // ===========================================================================
  // Scope Management
  // ===========================================================================

  push(context: Context): ScopeGuard {
    const depth = this.scopes.length;
    this.scopes.push(context);

    let restored = false;
    return {
      depth,
      restore: () => {
        if (restored) return;
        restored = true;
        if (this.scopes[depth] === context) {
          this.truncate(depth);
        }
      },
    };
  }

  /**
   * Run `fn` with `context` pushed, then restore the previous depth
   */
  withScope<T>(context: Context, fn: (stack: ScopeStack) => T): T {
    const guard = this.push(context);
    try {
      return fn(this);
    } finally {
      guard.restore();
    }
  }

  pushView(view: AddressableView): ScopeGuard {
    return this.push(new SheetContext(view));
  }

  /**
   * @throws ReadOnlyError when the view refuses write access
   */
  pushWritable(view: AddressableView): ScopeGuard {
    return this.push(new WritableSheetContext(view.mutable()));
  }

  private truncate(depth: number): void {
    if (this.scopes.length > depth) {
      this.scopes.length = depth;
    }
  }

  // ===========================================================================
  // Context
  // ===========================================================================

  resolve(name: string): Value {
    return this.search((scope) => scope.resolve(name), () => new UndefinedIdentifierError(name));
  }

  at(position: Position): ScalarValue {
    return this.search((scope) => scope.at(position), () => new NotAvailableError('cell access'));
  }

  range(start: Position, end: Position): ArrayValue | ErrorValue {
    return this.search((scope) => scope.range(start, end), () => new NotAvailableError('range access'));
  }

  /**
   * Write through the topmost writable scope
   * @throws ReadOnlyError when no scope accepts writes
   */
  setValue(position: Position, value: ScalarValue): void {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (isWritable(scope)) {
        scope.setValue(position, value);
        return;
      }
    }
    throw new ReadOnlyError('scope stack');
  }

  private search<T>(lookup: (scope: Context) => T, empty: () => ResolutionError): T {
    let lastError: ResolutionError | null = null;

    for (let i = this.scopes.length - 1; i >= 0; i--) {
      try {
        return lookup(this.scopes[i]);
      } catch (error) {
        if (!(error instanceof ResolutionError)) {
          throw error;
        }
        lastError = error;
      }
    }

    throw lastError ?? empty();
  }
}
