/**
 * Class Structure Parsing
 * class, member declarations, parameter lists and subroutine bodies
 */

import {
  eatIdentifier,
  eatKeyword,
  eatSymbol,
  eatType,
  oneOf,
} from './terminals.js';
import { rule, sequence, take, zeroOrMore, zeroOrOne } from './combinators.js';
import { compileStatements } from './parser-statements.js';
import type { Outcome } from './outcome.js';
import type { ParserState } from './state.js';

/** `(',' varName)*` */
const moreNames = zeroOrMore(
  sequence(take(eatSymbol(',')), take(eatIdentifier()))
);

const classDeclaration = rule(
  'class',
  take(eatKeyword('class')),
  take(eatIdentifier()),
  take(eatSymbol('{')),
  zeroOrMore(compileClassVarDec),
  zeroOrMore(compileSubroutineDec),
  take(eatSymbol('}'))
);

const classVarDec = rule(
  'classVarDec',
  take(oneOf(eatKeyword('static'), eatKeyword('field'))),
  take(eatType()),
  take(eatIdentifier()),
  moreNames,
  take(eatSymbol(';'))
);

// 'void' is tried before the general type
const subroutineDec = rule(
  'subroutineDec',
  take(
    oneOf(
      eatKeyword('constructor'),
      eatKeyword('function'),
      eatKeyword('method')
    )
  ),
  take(oneOf(eatKeyword('void'), eatType())),
  take(eatIdentifier()),
  take(eatSymbol('(')),
  compileParameterList,
  take(eatSymbol(')')),
  compileSubroutineBody
);

const parameterList = rule(
  'parameterList',
  zeroOrOne(
    sequence(
      take(eatType()),
      take(eatIdentifier()),
      zeroOrMore(
        sequence(take(eatSymbol(',')), take(eatType()), take(eatIdentifier()))
      )
    )
  )
);

const subroutineBody = rule(
  'subroutineBody',
  take(eatSymbol('{')),
  zeroOrMore(compileVarDec),
  compileStatements,
  take(eatSymbol('}'))
);

const varDec = rule(
  'varDec',
  take(eatKeyword('var')),
  take(eatType()),
  take(eatIdentifier()),
  moreNames,
  take(eatSymbol(';'))
);

export function compileClass(state: ParserState): Outcome {
  return classDeclaration(state);
}

export function compileClassVarDec(state: ParserState): Outcome {
  return classVarDec(state);
}

export function compileSubroutineDec(state: ParserState): Outcome {
  return subroutineDec(state);
}

export function compileParameterList(state: ParserState): Outcome {
  return parameterList(state);
}

export function compileSubroutineBody(state: ParserState): Outcome {
  return subroutineBody(state);
}

export function compileVarDec(state: ParserState): Outcome {
  return varDec(state);
}
