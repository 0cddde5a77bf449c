/**
 * SheetFormula Engine - AddressCodec Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  columnToLetters,
  lettersToColumn,
  decodeAddress,
  tryDecodeAddress,
  encodeAddress,
  offsetPosition,
  decodeRange,
  encodeRange,
  normalizeRange,
  rangeDimension,
  isAddress,
  formatSheetName,
  addressKey,
} from './AddressCodec.js';
import { position, MAX_COLUMNS } from '../types/index.js';
import { AddressError } from '../errors/index.js';

describe('AddressCodec', () => {
  // ===========================================================================
  // Columns
  // ===========================================================================

  describe('columns', () => {
    it('should convert boundary columns to letters', () => {
      expect(columnToLetters(1)).toBe('A');
      expect(columnToLetters(26)).toBe('Z');
      expect(columnToLetters(27)).toBe('AA');
      expect(columnToLetters(52)).toBe('AZ');
      expect(columnToLetters(53)).toBe('BA');
      expect(columnToLetters(702)).toBe('ZZ');
      expect(columnToLetters(703)).toBe('AAA');
      expect(columnToLetters(MAX_COLUMNS)).toBe('ZZZ');
    });

    it('should convert letters case-insensitively', () => {
      expect(lettersToColumn('a')).toBe(1);
      expect(lettersToColumn('Aa')).toBe(27);
      expect(lettersToColumn('zzz')).toBe(MAX_COLUMNS);
    });

    it('should return 0 for empty or non-letter input', () => {
      expect(columnToLetters(0)).toBe('');
      expect(lettersToColumn('')).toBe(0);
      expect(lettersToColumn('A1')).toBe(0);
    });

    it('should round trip every column up to ZZZ', () => {
      for (let column = 1; column <= MAX_COLUMNS; column++) {
        const pos = position(column, 7);
        const decoded = decodeAddress(encodeAddress(pos));
        if (decoded.column !== column || decoded.row !== 7) {
          throw new Error(`round trip failed for column ${column}`);
        }
      }
    });
  });

  // ===========================================================================
  // Decode
  // ===========================================================================

  describe('decodeAddress', () => {
    it('should decode a relative address', () => {
      expect(decodeAddress('B12')).toEqual({
        column: 2,
        row: 12,
        absoluteColumn: false,
        absoluteRow: false,
      });
    });

    it('should decode absolute markers', () => {
      const pos = decodeAddress('$C$4');
      expect(pos.absoluteColumn).toBe(true);
      expect(pos.absoluteRow).toBe(true);
      expect(decodeAddress('$C4').absoluteRow).toBe(false);
      expect(decodeAddress('C$4').absoluteColumn).toBe(false);
    });

    it('should decode lower case letters', () => {
      expect(decodeAddress('aa3')).toMatchObject({ column: 27, row: 3 });
    });

    it('should accept row 0 as unset', () => {
      expect(decodeAddress('A0')).toMatchObject({ column: 1, row: 0 });
    });

    it('should decode sheet qualifiers', () => {
      expect(decodeAddress('Sheet1!C3')).toMatchObject({ sheet: 'Sheet1', column: 3, row: 3 });
      expect(decodeAddress("'Q1 data'!$D$4")).toMatchObject({
        sheet: 'Q1 data',
        column: 4,
        row: 4,
        absoluteColumn: true,
        absoluteRow: true,
      });
      expect(decodeAddress("'it''s'!A1").sheet).toBe("it's");
    });

    it('should reject malformed addresses', () => {
      expect(() => decodeAddress('')).toThrow(AddressError);
      expect(() => decodeAddress('12')).toThrow('missing column');
      expect(() => decodeAddress('ABC')).toThrow('missing row');
      expect(() => decodeAddress('A1B')).toThrow('invalid row number');
      expect(() => decodeAddress('A$')).toThrow('invalid row number');
      expect(() => decodeAddress('ABCD1')).toThrow('column out of range');
      expect(() => decodeAddress('!A1')).toThrow('empty sheet name');
    });

    it('should return null from tryDecodeAddress on failure', () => {
      expect(tryDecodeAddress('total')).toBeNull();
      expect(tryDecodeAddress('A1')).not.toBeNull();
      expect(isAddress('sum')).toBe(false);
      expect(isAddress('sum1')).toBe(true);
    });
  });

  // ===========================================================================
  // Encode
  // ===========================================================================

  describe('encodeAddress', () => {
    it('should encode markers and sheet prefixes', () => {
      expect(encodeAddress(decodeAddress('$A$1'))).toBe('$A$1');
      expect(encodeAddress(position(3, 9, 'Data'))).toBe('Data!C9');
      expect(encodeAddress(position(1, 1, 'Q1 data'))).toBe("'Q1 data'!A1");
      expect(encodeAddress(position(1, 1, "it's"))).toBe("'it''s'!A1");
    });

    it('should encode an unset column as an empty string', () => {
      expect(encodeAddress(position(0, 5))).toBe('');
    });

    it('should quote sheet names that are not identifiers', () => {
      expect(formatSheetName('Sheet_2')).toBe('Sheet_2');
      expect(formatSheetName('2024')).toBe("'2024'");
    });

    it('should build lookup keys without markers', () => {
      expect(addressKey(decodeAddress('$B$2'), 'Main')).toBe('Main!B2');
      expect(addressKey(decodeAddress('Other!B2'), 'Main')).toBe('Other!B2');
      expect(addressKey(decodeAddress('B2'))).toBe('B2');
    });
  });

  // ===========================================================================
  // Relocation
  // ===========================================================================

  describe('offsetPosition', () => {
    it('should shift relative components', () => {
      expect(encodeAddress(offsetPosition(decodeAddress('A2'), 1, 1))).toBe('B3');
    });

    it('should keep absolute components', () => {
      expect(encodeAddress(offsetPosition(decodeAddress('$A$2'), 1, 1))).toBe('$A$2');
      expect(encodeAddress(offsetPosition(decodeAddress('$A2'), 1, 1))).toBe('$A3');
      expect(encodeAddress(offsetPosition(decodeAddress('A$2'), 1, 1))).toBe('B$2');
    });

    it('should not modify the input', () => {
      const pos = decodeAddress('C3');
      offsetPosition(pos, 5, 5);
      expect(encodeAddress(pos)).toBe('C3');
    });
  });

  // ===========================================================================
  // Ranges
  // ===========================================================================

  describe('ranges', () => {
    it('should decode a range and share the sheet', () => {
      const range = decodeRange('Data!A1:B10');
      expect(range.start).toMatchObject({ sheet: 'Data', column: 1, row: 1 });
      expect(range.end).toMatchObject({ sheet: 'Data', column: 2, row: 10 });
    });

    it('should decode a single address as a one-cell range', () => {
      const range = decodeRange('C3');
      expect(range.end).toEqual(range.start);
    });

    it('should reject ranges across sheets', () => {
      expect(() => decodeRange('A!A1:B!B2')).toThrow('range spans several sheets');
    });

    it('should encode the sheet only once', () => {
      expect(encodeRange(decodeRange('Data!$A$1:B10'))).toBe('Data!$A$1:B10');
    });

    it('should normalize reversed corners', () => {
      const range = normalizeRange(decodeRange('C5:A1'));
      expect(encodeRange(range)).toBe('A1:C5');
      expect(rangeDimension(decodeRange('C5:A1'))).toEqual({ rows: 5, columns: 3 });
    });
  });
});
