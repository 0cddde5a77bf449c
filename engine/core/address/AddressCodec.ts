/**
 * SheetFormula Engine - Address Codec
 *
 * Pure conversions between textual cell references and positions:
 * - `$A$1`, `b12`, `Sheet1!C3`, `'Q1 data'!D4`
 * - bijective base-26 columns (A=1 ... Z=26, AA=27, no zero digit)
 * - relocation of relative components when a formula moves
 */

import type { Position, CellRange } from '../types/index.js';
import { MAX_COLUMN_LETTERS } from '../types/index.js';
import { AddressError } from '../errors/index.js';

const DOLLAR = '$';
const PLAIN_SHEET_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ===========================================================================
// Columns
// ===========================================================================

/**
 * Convert a 1-based column index to letters (1 -> "A", 27 -> "AA")
 */
export function columnToLetters(column: number): string {
  let letters = '';
  let c = column;

  while (c > 0) {
    c--;
    letters = String.fromCharCode(65 + (c % 26)) + letters;
    c = Math.floor(c / 26);
  }

  return letters;
}

/**
 * Convert column letters to a 1-based index ("A" -> 1, "aa" -> 27).
 * Returns 0 for an empty string or any non-letter.
 */
export function lettersToColumn(letters: string): number {
  let column = 0;
  for (const char of letters.toUpperCase()) {
    const code = char.charCodeAt(0);
    if (code < 65 || code > 90) return 0;
    column = column * 26 + (code - 64);
  }
  return column;
}

function isLetter(char: string): boolean {
  return (char >= 'A' && char <= 'Z') || (char >= 'a' && char <= 'z');
}

function isDigits(text: string): boolean {
  return /^[0-9]+$/.test(text);
}

// ===========================================================================
// Sheet Qualifiers
// ===========================================================================

function splitSheet(text: string): { sheet?: string; local: string } {
  const bang = text.lastIndexOf('!');
  if (bang < 0) {
    return { local: text };
  }

  let sheet = text.slice(0, bang);
  if (sheet.length >= 2 && sheet.startsWith("'") && sheet.endsWith("'")) {
    sheet = sheet.slice(1, -1).replace(/''/g, "'");
  }
  if (sheet === '') {
    throw new AddressError(text, 'empty sheet name');
  }

  return { sheet, local: text.slice(bang + 1) };
}

/**
 * Render a sheet qualifier, quoting names that are not plain identifiers
 */
export function formatSheetName(sheet: string): string {
  if (PLAIN_SHEET_NAME.test(sheet)) {
    return sheet;
  }
  return `'${sheet.replace(/'/g, "''")}'`;
}

// ===========================================================================
// Decode / Encode
// ===========================================================================

/**
 * Decode a cell reference like "$B$2" or "Sheet1!C3"
 * @throws AddressError when the column or the row is missing or malformed
 */
export function decodeAddress(text: string): Position {
  if (text === '') {
    throw new AddressError(text, 'empty cell address');
  }

  const { sheet, local } = splitSheet(text);
  let offset = 0;

  const absoluteColumn = local[offset] === DOLLAR;
  if (absoluteColumn) offset++;

  const letterStart = offset;
  while (offset < local.length && isLetter(local[offset])) {
    offset++;
  }
  const letters = local.slice(letterStart, offset);
  if (letters.length === 0) {
    throw new AddressError(text, 'missing column');
  }
  if (letters.length > MAX_COLUMN_LETTERS) {
    throw new AddressError(text, 'column out of range');
  }
  if (offset >= local.length) {
    throw new AddressError(text, 'missing row');
  }

  const absoluteRow = local[offset] === DOLLAR;
  if (absoluteRow) offset++;

  const digits = local.slice(offset);
  if (!isDigits(digits)) {
    throw new AddressError(text, 'invalid row number');
  }
  const row = Number(digits);
  if (!Number.isSafeInteger(row)) {
    throw new AddressError(text, 'invalid row number');
  }

  const pos: Position = {
    column: lettersToColumn(letters),
    row,
    absoluteColumn,
    absoluteRow,
  };
  if (sheet !== undefined) {
    pos.sheet = sheet;
  }
  return pos;
}

/**
 * Same as decodeAddress but returns null instead of throwing
 */
export function tryDecodeAddress(text: string): Position | null {
  try {
    return decodeAddress(text);
  } catch (error) {
    if (error instanceof AddressError) return null;
    throw error;
  }
}

export function isAddress(text: string): boolean {
  return tryDecodeAddress(text) !== null;
}

/**
 * Encode a position back to text. An unset column renders as "".
 */
export function encodeAddress(pos: Position): string {
  if (pos.column === 0) {
    return '';
  }

  const parts: string[] = [];
  if (pos.sheet) {
    parts.push(formatSheetName(pos.sheet), '!');
  }
  if (pos.absoluteColumn) parts.push(DOLLAR);
  parts.push(columnToLetters(pos.column));
  if (pos.absoluteRow) parts.push(DOLLAR);
  parts.push(String(pos.row));

  return parts.join('');
}

/**
 * Sheet-qualified address without `$` markers, used as a lookup key
 */
export function addressKey(pos: Position, defaultSheet = ''): string {
  const sheet = pos.sheet ?? defaultSheet;
  const local = `${columnToLetters(pos.column)}${pos.row}`;
  return sheet ? `${sheet}!${local}` : local;
}

// ===========================================================================
// Relocation
// ===========================================================================

/**
 * Shift the relative components of a position. Absolute components
 * (marked with `$`) are left untouched.
 */
export function offsetPosition(pos: Position, deltaRow: number, deltaColumn: number): Position {
  return {
    ...pos,
    row: pos.absoluteRow ? pos.row : pos.row + deltaRow,
    column: pos.absoluteColumn ? pos.column : pos.column + deltaColumn,
  };
}

// ===========================================================================
// Ranges
// ===========================================================================

/**
 * Decode "A1:B10" or "Sheet1!A1:B10". The end inherits the start's sheet.
 * A single address decodes to a one-cell range.
 */
export function decodeRange(text: string): CellRange {
  const colon = text.lastIndexOf(':');
  if (colon < 0) {
    const start = decodeAddress(text);
    return { start, end: { ...start } };
  }

  const start = decodeAddress(text.slice(0, colon));
  const end = decodeAddress(text.slice(colon + 1));
  if (end.sheet !== undefined && end.sheet !== start.sheet) {
    throw new AddressError(text, 'range spans several sheets');
  }
  if (start.sheet !== undefined) {
    end.sheet = start.sheet;
  }
  return { start, end };
}

export function encodeRange(range: CellRange): string {
  const end: Position = { ...range.end };
  delete end.sheet;
  return `${encodeAddress(range.start)}:${encodeAddress(end)}`;
}

/**
 * Reorder the corners so that start <= end on both axes
 */
export function normalizeRange(range: CellRange): CellRange {
  const { start, end } = range;
  return {
    start: {
      ...start,
      row: Math.min(start.row, end.row),
      column: Math.min(start.column, end.column),
    },
    end: {
      ...end,
      row: Math.max(start.row, end.row),
      column: Math.max(start.column, end.column),
    },
  };
}

export function rangeDimension(range: CellRange): { rows: number; columns: number } {
  const { start, end } = normalizeRange(range);
  return {
    rows: end.row - start.row + 1,
    columns: end.column - start.column + 1,
  };
}
