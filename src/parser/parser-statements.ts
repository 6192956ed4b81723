/**
 * Statement Parsing
 * statements and the five statement forms, dispatched by leading keyword
 */

import { eatIdentifier, eatKeyword, eatSymbol } from './terminals.js';
import {
  or,
  rule,
  sequence,
  take,
  zeroOrMore,
  zeroOrOne,
} from './combinators.js';
import { compileExpression, subroutineCall } from './parser-expr.js';
import type { Outcome } from './outcome.js';
import type { ParserState } from './state.js';

/** `{ statements }` */
const block = sequence(
  take(eatSymbol('{')),
  compileStatements,
  take(eatSymbol('}'))
);

/** `( expression )` */
const condition = sequence(
  take(eatSymbol('(')),
  compileExpression,
  take(eatSymbol(')'))
);

const statements = rule(
  'statements',
  zeroOrMore(or(compileLet, compileIf, compileWhile, compileDo, compileReturn))
);

const letStatement = rule(
  'letStatement',
  take(eatKeyword('let')),
  take(eatIdentifier()),
  zeroOrOne(
    sequence(take(eatSymbol('[')), compileExpression, take(eatSymbol(']')))
  ),
  take(eatSymbol('=')),
  compileExpression,
  take(eatSymbol(';'))
);

const ifStatement = rule(
  'ifStatement',
  take(eatKeyword('if')),
  condition,
  block,
  zeroOrOne(sequence(take(eatKeyword('else')), block))
);

const whileStatement = rule(
  'whileStatement',
  take(eatKeyword('while')),
  condition,
  block
);

const doStatement = rule(
  'doStatement',
  take(eatKeyword('do')),
  subroutineCall,
  take(eatSymbol(';'))
);

const returnStatement = rule(
  'returnStatement',
  take(eatKeyword('return')),
  zeroOrOne(compileExpression),
  take(eatSymbol(';'))
);

export function compileStatements(state: ParserState): Outcome {
  return statements(state);
}

export function compileLet(state: ParserState): Outcome {
  return letStatement(state);
}

export function compileIf(state: ParserState): Outcome {
  return ifStatement(state);
}

export function compileWhile(state: ParserState): Outcome {
  return whileStatement(state);
}

export function compileDo(state: ParserState): Outcome {
  return doStatement(state);
}

export function compileReturn(state: ParserState): Outcome {
  return returnStatement(state);
}
