/**
 * Token Source
 * Forward-only cursor over classified tokens
 */

import type { SourceSpan } from '../source-location.js';
import {
  isJackSymbol,
  isKeyword,
  type JackSymbol,
  type Keyword,
  type Token,
  TOKEN_TYPES,
  type TokenType,
} from '../token-types.js';
import { tokenize } from './tokenizer.js';

/**
 * Contract the grammar engine consumes. `advance()` must be called before
 * the first token is inspected; the typed accessors are valid only for the
 * matching `tokenType()`.
 */
export interface TokenSource {
  hasMoreTokens(): boolean;
  advance(): void;
  tokenType(): TokenType;
  keyword(): Keyword;
  symbol(): JackSymbol;
  identifier(): string;
  /** Needed only by sources that yield integer constants */
  intVal?(): number;
  /** Needed only by sources that yield string constants */
  stringVal?(): string;
  /** Position of the current token; diagnostics omit locations without it */
  currentSpan?(): SourceSpan;
}

export class JackTokenizer implements TokenSource {
  private readonly tokens: readonly Token[];
  private index = -1;

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens;
  }

  static fromSource(source: string): JackTokenizer {
    return new JackTokenizer(tokenize(source));
  }

  hasMoreTokens(): boolean {
    return this.index + 1 < this.tokens.length;
  }

  advance(): void {
    if (!this.hasMoreTokens()) {
      throw new RangeError('advance() called with no more tokens');
    }
    this.index++;
  }

  currentToken(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw new RangeError('No current token; call advance() first');
    }
    return token;
  }

  currentSpan(): SourceSpan {
    return this.currentToken().span;
  }

  tokenType(): TokenType {
    return this.currentToken().type;
  }

  keyword(): Keyword {
    const value = this.expectType(TOKEN_TYPES.KEYWORD);
    if (!isKeyword(value)) {
      throw new TypeError(`Not a keyword: ${value}`);
    }
    return value;
  }

  symbol(): JackSymbol {
    const value = this.expectType(TOKEN_TYPES.SYMBOL);
    if (!isJackSymbol(value)) {
      throw new TypeError(`Not a symbol: ${value}`);
    }
    return value;
  }

  identifier(): string {
    return this.expectType(TOKEN_TYPES.IDENTIFIER);
  }

  intVal(): number {
    return Number(this.expectType(TOKEN_TYPES.INT_CONST));
  }

  stringVal(): string {
    return this.expectType(TOKEN_TYPES.STRING_CONST);
  }

  private expectType(type: TokenType): string {
    const token = this.currentToken();
    if (token.type !== type) {
      throw new TypeError(
        `Current token is ${token.type}, not ${type}: ${token.value}`
      );
    }
    return token.value;
  }
}
