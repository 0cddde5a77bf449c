/**
 * SheetFormula Engine
 *
 * A spreadsheet formula language:
 * - Lexer and Pratt parser producing an immutable expression tree
 * - Tree-walking evaluator over a small value model with in-language errors
 * - Layered resolution contexts (environments, sheets, workbooks, scope stacks)
 * - Dependency-aware recalculation of formulas stored in sheets
 *
 * @example
 * ```typescript
 * import { FormulaEngine, MemoryWorkbook, decodeAddress } from 'sheetformula-engine';
 *
 * const book = new MemoryWorkbook();
 * const sheet = book.addSheet('Sheet1');
 * sheet.setInput(decodeAddress('A1'), '20');
 *
 * const engine = new FormulaEngine();
 * engine.setFormula(book, 'Sheet1', decodeAddress('B1'), '=A1 & " items"');
 * engine.recalculate(book);
 *
 * console.log(sheet.cell(decodeAddress('B1'))?.display); // "20 items"
 * ```
 */

export * from './core/index.js';
