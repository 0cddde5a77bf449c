/**
 * SheetFormula Engine - AST Debug Dump
 *
 * Structural rendering used by parser tests and debug output, e.g.
 * `binary(number(1), binary(number(1), number(2), *), +)`.
 */

import type { Expr, CellExpr } from './Ast.js';
import { encodeAddress } from '../address/AddressCodec.js';
import { formatNumber } from '../values/Value.js';

function dumpCell(expr: CellExpr): string {
  const { absoluteColumn, absoluteRow } = expr.position;
  const address = encodeAddress({ ...expr.position, absoluteColumn: false, absoluteRow: false });
  return `cell(${address}, ${absoluteColumn}, ${absoluteRow})`;
}

export function dumpExpr(expr: Expr): string {
  switch (expr.type) {
    case 'identifier':
      return `identifier(${expr.name})`;
    case 'number':
      return `number(${formatNumber(expr.value)})`;
    case 'literal':
      return `literal(${expr.value})`;
    case 'unary':
      return `unary(${dumpExpr(expr.operand)}, ${expr.operator})`;
    case 'binary':
      return `binary(${dumpExpr(expr.left)}, ${dumpExpr(expr.right)}, ${expr.operator})`;
    case 'call':
      return `call(${dumpExpr(expr.callee)}, args: ${expr.args.map(dumpExpr).join(', ')})`;
    case 'cell':
      return dumpCell(expr);
    case 'range':
      return `range(${dumpCell(expr.start)}, ${dumpCell(expr.end)})`;
  }
}
