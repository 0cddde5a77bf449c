/**
 * SheetFormula Engine - Tokens
 */

export type TokenKind =
  | 'eof'
  | 'eol'
  | 'keyword'
  | 'identifier'
  | 'number'
  | 'literal'
  | 'comment'
  | 'assign'
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'percent'
  | 'pow'
  | 'concat'
  | 'eq'
  | 'ne'
  | 'lt'
  | 'le'
  | 'gt'
  | 'ge'
  | 'comma'
  | 'dot'
  | 'begin-group'
  | 'end-group'
  | 'begin-block'
  | 'end-block'
  | 'begin-prop'
  | 'end-prop'
  | 'range'
  | 'sheet'
  | 'invalid';

export interface Token {
  kind: TokenKind;
  /** Source text of the token; for literals, the text between the quotes */
  literal: string;
  /** 1-based line of the first character */
  line: number;
  /** 1-based column of the first character */
  column: number;
}

/** Reserved words, recognized in script mode only */
export const KEYWORDS: ReadonlySet<string> = new Set([
  'view',
  'sheet',
  'let',
  'import',
  'from',
  'print',
  'use',
  'with',
  'end',
]);

/** Single-character punctuation */
export const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  '+': 'add',
  '-': 'sub',
  '*': 'mul',
  '/': 'div',
  '%': 'percent',
  '^': 'pow',
  '&': 'concat',
  '=': 'eq',
  '<': 'lt',
  '>': 'gt',
  ',': 'comma',
  ';': 'comma',
  '.': 'dot',
  '(': 'begin-group',
  ')': 'end-group',
  '{': 'begin-block',
  '}': 'end-block',
  '[': 'begin-prop',
  ']': 'end-prop',
  ':': 'range',
  '!': 'sheet',
};

/**
 * Human readable rendering used in syntax error messages
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'eof':
      return 'end of input';
    case 'eol':
      return 'end of line';
    case 'literal':
      return `literal "${token.literal}"`;
    case 'identifier':
    case 'keyword':
    case 'number':
      return `${token.kind} ${token.literal}`;
    case 'invalid':
      return `invalid token ${JSON.stringify(token.literal)}`;
    default:
      return `"${token.literal}"`;
  }
}
