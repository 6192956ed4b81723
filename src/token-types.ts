import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  KEYWORD: 'keyword',
  SYMBOL: 'symbol',
  IDENTIFIER: 'identifier',
  INT_CONST: 'integerConstant',
  STRING_CONST: 'stringConstant',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

// ============================================================
// KEYWORDS AND SYMBOLS
// ============================================================

export type Keyword =
  | 'class'
  | 'constructor'
  | 'function'
  | 'method'
  | 'field'
  | 'static'
  | 'var'
  | 'int'
  | 'char'
  | 'boolean'
  | 'void'
  | 'true'
  | 'false'
  | 'null'
  | 'this'
  | 'let'
  | 'do'
  | 'if'
  | 'else'
  | 'while'
  | 'return';

export type JackSymbol =
  | '{'
  | '}'
  | '('
  | ')'
  | '['
  | ']'
  | '.'
  | ','
  | ';'
  | '+'
  | '-'
  | '*'
  | '/'
  | '&'
  | '|'
  | '<'
  | '>'
  | '='
  | '~';

/** Keyword spellings, indexed by keyword */
export const KEYWORDS: Readonly<Record<Keyword, string>> = Object.freeze({
  class: 'class',
  constructor: 'constructor',
  function: 'function',
  method: 'method',
  field: 'field',
  static: 'static',
  var: 'var',
  int: 'int',
  char: 'char',
  boolean: 'boolean',
  void: 'void',
  true: 'true',
  false: 'false',
  null: 'null',
  this: 'this',
  let: 'let',
  do: 'do',
  if: 'if',
  else: 'else',
  while: 'while',
  return: 'return',
});

/** Symbol spellings, indexed by symbol */
export const SYMBOLS: Readonly<Record<JackSymbol, string>> = Object.freeze({
  '{': '{',
  '}': '}',
  '(': '(',
  ')': ')',
  '[': '[',
  ']': ']',
  '.': '.',
  ',': ',',
  ';': ';',
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '&': '&',
  '|': '|',
  '<': '<',
  '>': '>',
  '=': '=',
  '~': '~',
});

export function isKeyword(text: string): text is Keyword {
  return Object.prototype.hasOwnProperty.call(KEYWORDS, text);
}

export function isJackSymbol(text: string): text is JackSymbol {
  return Object.prototype.hasOwnProperty.call(SYMBOLS, text);
}

/** Largest value an integer constant may hold */
export const MAX_INT_CONST = 32767;

// ============================================================
// TOKEN
// ============================================================

/**
 * Token as a parser reads it from a token source. The span is known only
 * when the source reports positions.
 */
export interface SourceToken {
  readonly type: TokenType;
  /** Literal text; string constants exclude their quotes */
  readonly value: string;
  readonly span?: SourceSpan | undefined;
}

/** Token produced by the tokenizer */
export interface Token extends SourceToken {
  readonly span: SourceSpan;
}

/** Human-readable token description for diagnostics, e.g. `symbol ';'` */
export function describeToken(token: SourceToken): string {
  switch (token.type) {
    case TOKEN_TYPES.KEYWORD:
      return `keyword '${token.value}'`;
    case TOKEN_TYPES.SYMBOL:
      return `symbol '${token.value}'`;
    case TOKEN_TYPES.IDENTIFIER:
      return `identifier '${token.value}'`;
    case TOKEN_TYPES.INT_CONST:
      return `integer constant ${token.value}`;
    case TOKEN_TYPES.STRING_CONST:
      return `string constant "${token.value}"`;
  }
}
