/**
 * Parser Module
 * Grammar engine, combinators and productions
 */

export { CompilationEngine, type EngineOptions } from './engine.js';
export {
  expecting,
  or,
  rule,
  sequence,
  type Step,
  take,
  takeNextToken,
  zeroOrMore,
  zeroOrOne,
} from './combinators.js';
export {
  eatIdentifier,
  eatIntegerConstant,
  eatKeyword,
  eatStringConstant,
  eatSymbol,
  eatType,
  named,
  oneOf,
  type TerminalEater,
} from './terminals.js';
export {
  type FailedOutcome,
  type Failure,
  isRecoverableKind,
  MATCHED,
  type Outcome,
  RECOVERABLE_KINDS,
} from './outcome.js';
export {
  type BacktrackEvent,
  createParserState,
  type EngineCallbacks,
  type ParserState,
  type RuleEndEvent,
  type RuleStartEvent,
} from './state.js';
export * from './parser-class.js';
export * from './parser-statements.js';
export * from './parser-expr.js';
