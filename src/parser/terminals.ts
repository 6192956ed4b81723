/**
 * Terminal Eaters
 * Validate the current token and append a leaf for it
 */

import {
  type JackSymbol,
  type Keyword,
  KEYWORDS,
  SYMBOLS,
  type SourceToken,
  TOKEN_TYPES,
} from '../token-types.js';
import type { FailureKind } from '../error-classes.js';
import { malformed, MATCHED, notApplicable, type Outcome } from './outcome.js';
import type { ParserState } from './state.js';

/**
 * Validates one token. Eaters never move the cursor; `takeNextToken`
 * advances past the token when `eat` matches.
 */
export interface TerminalEater {
  /** Description used in diagnostics, e.g. `keyword 'class'` */
  readonly expected: string;
  eat(state: ParserState, token: SourceToken): Outcome;
}

function mismatch(
  state: ParserState,
  kind: FailureKind,
  expected: string,
  token: SourceToken
): Outcome {
  return notApplicable({ kind, expected, found: token, index: state.pos });
}

export function eatKeyword(keyword: Keyword): TerminalEater {
  const text = KEYWORDS[keyword];
  const expected = `keyword '${text}'`;
  return {
    expected,
    eat(state, token) {
      if (token.type !== TOKEN_TYPES.KEYWORD) {
        return mismatch(state, 'KeywordNotFound', expected, token);
      }
      if (token.value !== text) {
        return mismatch(state, 'WrongKeyword', expected, token);
      }
      state.tree.leaf(TOKEN_TYPES.KEYWORD, text);
      return MATCHED;
    },
  };
}

export function eatSymbol(symbol: JackSymbol): TerminalEater {
  const text = SYMBOLS[symbol];
  const expected = `symbol '${text}'`;
  return {
    expected,
    eat(state, token) {
      if (token.type !== TOKEN_TYPES.SYMBOL) {
        return mismatch(state, 'SymbolNotFound', expected, token);
      }
      if (token.value !== text) {
        return mismatch(state, 'WrongSymbol', expected, token);
      }
      state.tree.leaf(TOKEN_TYPES.SYMBOL, text);
      return MATCHED;
    },
  };
}

export function eatIdentifier(): TerminalEater {
  const expected = 'identifier';
  return {
    expected,
    eat(state, token) {
      if (token.type !== TOKEN_TYPES.IDENTIFIER) {
        return mismatch(state, 'IdentifierNotFound', expected, token);
      }
      state.tree.leaf(TOKEN_TYPES.IDENTIFIER, token.value);
      return MATCHED;
    },
  };
}

export function eatIntegerConstant(): TerminalEater {
  const expected = 'integer constant';
  return {
    expected,
    eat(state, token) {
      if (token.type !== TOKEN_TYPES.INT_CONST) {
        return mismatch(state, 'IntegerConstantNotFound', expected, token);
      }
      state.tree.leaf(TOKEN_TYPES.INT_CONST, token.value);
      return MATCHED;
    },
  };
}

export function eatStringConstant(): TerminalEater {
  const expected = 'string constant';
  return {
    expected,
    eat(state, token) {
      if (token.type !== TOKEN_TYPES.STRING_CONST) {
        return mismatch(state, 'StringConstantNotFound', expected, token);
      }
      state.tree.leaf(TOKEN_TYPES.STRING_CONST, token.value);
      return MATCHED;
    },
  };
}

function joinAlternatives(descriptions: readonly string[]): string {
  if (descriptions.length < 2) return descriptions.join('');
  return `${descriptions.slice(0, -1).join(', ')} or ${descriptions[descriptions.length - 1]}`;
}

/**
 * Ordered alternative over eaters for the same token: the first match wins,
 * otherwise the last failure is returned (relabelled with the combined
 * expectation).
 */
export function oneOf(
  first: TerminalEater,
  ...rest: TerminalEater[]
): TerminalEater {
  const eaters = [first, ...rest];
  const expected = joinAlternatives(eaters.map((eater) => eater.expected));
  return named(expected, {
    expected,
    eat(state, token) {
      let outcome = first.eat(state, token);
      for (const eater of rest) {
        if (outcome.type === 'matched') break;
        outcome = eater.eat(state, token);
      }
      return outcome;
    },
  });
}

/** Replace an eater's expectation in its description and failures */
export function named(expected: string, eater: TerminalEater): TerminalEater {
  return {
    expected,
    eat(state, token) {
      const outcome = eater.eat(state, token);
      if (outcome.type === 'matched') return outcome;
      const failure = { ...outcome.failure, expected };
      return outcome.type === 'malformed'
        ? malformed(failure)
        : notApplicable(failure);
    },
  };
}

/** `int`, `char`, `boolean` or a class name */
export function eatType(): TerminalEater {
  return named(
    'type',
    oneOf(
      eatKeyword('int'),
      eatKeyword('char'),
      eatKeyword('boolean'),
      eatIdentifier()
    )
  );
}
