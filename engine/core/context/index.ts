/**
 * SheetFormula Engine - Context Module
 */

export type { Context } from './Context.js';
export { Environment } from './Environment.js';
export { SheetContext, WritableSheetContext, isWritable } from './SheetContext.js';
export type { WritableContext } from './SheetContext.js';
export { WorkbookContext } from './WorkbookContext.js';
export { ReadOnlyContext } from './ReadOnlyContext.js';
export { ScopeStack } from './ScopeStack.js';
export type { ScopeGuard } from './ScopeStack.js';
