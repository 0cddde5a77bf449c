/**
 * SheetFormula Engine - Data Module Exports
 */

export type { Cell, AddressableView, MutableView, Workbook } from './View.js';

export { MemorySheet } from './MemorySheet.js';
export type { MemorySheetOptions, FormulaCell } from './MemorySheet.js';

export { MemoryWorkbook } from './MemoryWorkbook.js';

export { inspectView, inspectWorkbook } from './Inspect.js';
