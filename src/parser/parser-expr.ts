/**
 * Expression Parsing
 * expression, term, expressionList and subroutine calls
 *
 * Jack gives binary operators no precedence: `expression` is a flat
 * `term (op term)*` list evaluated left to right.
 */

import {
  eatIdentifier,
  eatIntegerConstant,
  eatKeyword,
  eatStringConstant,
  eatSymbol,
  oneOf,
} from './terminals.js';
import {
  expecting,
  or,
  rule,
  sequence,
  take,
  zeroOrMore,
  zeroOrOne,
} from './combinators.js';
import type { Outcome } from './outcome.js';
import type { ParserState } from './state.js';

const BINARY_OP = oneOf(
  eatSymbol('+'),
  eatSymbol('-'),
  eatSymbol('*'),
  eatSymbol('/'),
  eatSymbol('&'),
  eatSymbol('|'),
  eatSymbol('<'),
  eatSymbol('>'),
  eatSymbol('=')
);

const UNARY_OP = oneOf(eatSymbol('-'), eatSymbol('~'));

const KEYWORD_CONSTANT = oneOf(
  eatKeyword('true'),
  eatKeyword('false'),
  eatKeyword('null'),
  eatKeyword('this')
);

// ============================================================
// SUBROUTINE CALLS
// ============================================================

/** `( expressionList )` */
const callArguments = sequence(
  take(eatSymbol('(')),
  compileExpressionList,
  take(eatSymbol(')'))
);

/** `. subroutineName ( expressionList )` */
const qualifiedCall = sequence(
  take(eatSymbol('.')),
  take(eatIdentifier()),
  callArguments
);

/** `[ expression ]` */
const arrayIndex = sequence(
  take(eatSymbol('[')),
  compileExpression,
  take(eatSymbol(']'))
);

/**
 * subroutineName '(' expressionList ')'
 * | (className | varName) '.' subroutineName '(' expressionList ')'
 *
 * Emits no tag of its own.
 */
export const subroutineCall = sequence(
  take(eatIdentifier()),
  or(callArguments, qualifiedCall)
);

// ============================================================
// PRODUCTIONS
// ============================================================

const expression = rule(
  'expression',
  compileTerm,
  zeroOrMore(sequence(take(BINARY_OP), compileTerm))
);

/**
 * A term starting with an identifier consumes it once, then tries the
 * array index, call and qualified call suffixes.
 */
const term = rule(
  'term',
  expecting(
    'term',
    or(
      take(eatIntegerConstant()),
      take(eatStringConstant()),
      take(KEYWORD_CONSTANT),
      sequence(
        take(eatIdentifier()),
        zeroOrOne(or(arrayIndex, callArguments, qualifiedCall))
      ),
      sequence(take(eatSymbol('(')), compileExpression, take(eatSymbol(')'))),
      sequence(take(UNARY_OP), compileTerm)
    )
  )
);

const expressionList = rule(
  'expressionList',
  zeroOrOne(
    sequence(
      compileExpression,
      zeroOrMore(sequence(take(eatSymbol(',')), compileExpression))
    )
  )
);

export function compileExpression(state: ParserState): Outcome {
  return expression(state);
}

export function compileTerm(state: ParserState): Outcome {
  return term(state);
}

export function compileExpressionList(state: ParserState): Outcome {
  return expressionList(state);
}
