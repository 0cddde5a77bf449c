/**
 * SheetFormula Engine - View Introspection
 *
 * Object values describing views and workbooks, readable from formulas with
 * `get(object, "property")`.
 */

import type { AddressableView, Workbook } from './View.js';
import type { Value } from '../values/Value.js';
import { numberValue, textValue } from '../values/Value.js';
import { ArrayValue } from '../values/ArrayValue.js';
import { ObjectValue } from '../values/ObjectValue.js';
import { encodeRange, rangeDimension } from '../address/AddressCodec.js';

export function inspectView(view: AddressableView): ObjectValue {
  const bounds = view.bounds();
  const empty = bounds.start.row === 0;
  const size = empty ? { rows: 0, columns: 0 } : rangeDimension(bounds);

  const fields: Array<[string, Value]> = [
    ['name', textValue(view.name)],
    ['rows', numberValue(size.rows)],
    ['columns', numberValue(size.columns)],
    ['range', textValue(empty ? '' : encodeRange(bounds))],
  ];
  return new ObjectValue('view', fields);
}

export function inspectWorkbook(workbook: Workbook): ObjectValue {
  const names = workbook.sheetNames();
  const fields: Array<[string, Value]> = [
    ['sheets', numberValue(names.length)],
    ['active', textValue(names.length > 0 ? workbook.activeSheet().name : '')],
    ['names', ArrayValue.fromList(names.map(textValue))],
  ];
  return new ObjectValue('workbook', fields);
}
