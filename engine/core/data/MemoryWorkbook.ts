/**
 * SheetFormula Engine - In-Memory Workbook
 *
 * Ordered collection of MemorySheets with one active sheet.
 */

import type { Workbook } from './View.js';
import type { MemorySheetOptions } from './MemorySheet.js';
import { MemorySheet } from './MemorySheet.js';

export class MemoryWorkbook implements Workbook {
  private sheets: Map<string, MemorySheet> = new Map();
  private activeName: string | null = null;

  constructor(sheetNames: string[] = []) {
    for (const name of sheetNames) {
      this.addSheet(name);
    }
  }

  /**
   * Create a sheet. The first sheet added becomes the active one.
   * @throws Error when the name is empty or already taken
   */
  addSheet(name: string, options: MemorySheetOptions = {}): MemorySheet {
    if (name === '') {
      throw new Error('Sheet name must not be empty');
    }
    if (this.sheets.has(name)) {
      throw new Error(`Sheet ${name} already exists`);
    }

    const sheet = new MemorySheet(name, options);
    this.sheets.set(name, sheet);
    if (this.activeName === null) {
      this.activeName = name;
    }
    return sheet;
  }

  /**
   * Remove a sheet; when it was active, the first remaining sheet takes over
   */
  removeSheet(name: string): boolean {
    if (!this.sheets.delete(name)) {
      return false;
    }
    if (this.activeName === name) {
      const [first] = this.sheets.keys();
      this.activeName = first ?? null;
    }
    return true;
  }

  setActive(name: string): void {
    if (!this.sheets.has(name)) {
      throw new Error(`Sheet ${name} does not exist`);
    }
    this.activeName = name;
  }

  sheetNames(): string[] {
    return [...this.sheets.keys()];
  }

  sheet(name: string): MemorySheet | null {
    return this.sheets.get(name) ?? null;
  }

  /**
   * @throws Error when the workbook has no sheet
   */
  activeSheet(): MemorySheet {
    const sheet = this.activeName === null ? undefined : this.sheets.get(this.activeName);
    if (sheet === undefined) {
      throw new Error('Workbook has no sheet');
    }
    return sheet;
  }

  get sheetCount(): number {
    return this.sheets.size;
  }
}
