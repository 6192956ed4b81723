/**
 * Token Readers
 * Functions to read specific token types from source
 */

import {
  isKeyword,
  MAX_INT_CONST,
  TOKEN_TYPES,
  type Token,
} from '../token-types.js';
import { LexerError } from '../error-classes.js';
import {
  isDigit,
  isIdentifierChar,
  makeToken,
} from './helpers.js';
import { advance, currentLocation, isAtEnd, type LexerState, peek } from './state.js';

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (peek(state) !== '"') {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw new LexerError('JACK-L001', {}, start);
    }
    value += advance(state);
  }
  advance(state); // consume closing "

  return makeToken(
    TOKEN_TYPES.STRING_CONST,
    value,
    start,
    currentLocation(state)
  );
}

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  if (Number(value) > MAX_INT_CONST) {
    throw new LexerError(
      'JACK-L003',
      { value, max: MAX_INT_CONST },
      start
    );
  }

  return makeToken(TOKEN_TYPES.INT_CONST, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = isKeyword(value) ? TOKEN_TYPES.KEYWORD : TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}
