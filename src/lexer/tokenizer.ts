/**
 * Tokenizer
 * Splits Jack source text into classified tokens
 */

import { isJackSymbol, TOKEN_TYPES, type Token } from '../token-types.js';
import { LexerError } from '../error-classes.js';
import {
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Skip whitespace, `//` line comments and block comments */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      advance(state);
    } else if (ch === '/' && peek(state, 1) === '/') {
      while (!isAtEnd(state) && peek(state) !== '\n') advance(state);
    } else if (ch === '/' && peek(state, 1) === '*') {
      const start = currentLocation(state);
      advance(state);
      advance(state);
      while (!(peek(state) === '*' && peek(state, 1) === '/')) {
        if (isAtEnd(state)) {
          throw new LexerError('JACK-L004', {}, start);
        }
        advance(state);
      }
      advance(state);
      advance(state);
    } else {
      return;
    }
  }
}

/** Read the next token, or null at end of input */
export function nextToken(state: LexerState): Token | null {
  skipTrivia(state);

  if (isAtEnd(state)) {
    return null;
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  if (isJackSymbol(ch)) {
    advance(state);
    return makeToken(TOKEN_TYPES.SYMBOL, ch, start, currentLocation(state));
  }

  throw new LexerError('JACK-L002', { char: ch }, start);
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  for (let token = nextToken(state); token; token = nextToken(state)) {
    tokens.push(token);
  }

  return tokens;
}
