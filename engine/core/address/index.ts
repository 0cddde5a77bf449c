/**
 * SheetFormula Engine - Address Module
 */

export {
  columnToLetters,
  lettersToColumn,
  formatSheetName,
  decodeAddress,
  tryDecodeAddress,
  isAddress,
  encodeAddress,
  addressKey,
  offsetPosition,
  decodeRange,
  encodeRange,
  normalizeRange,
  rangeDimension,
} from './AddressCodec.js';
