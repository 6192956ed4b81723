/**
 * Parser State
 * Token cursor with snapshot/restore, parse tree buffer and callbacks
 */

import type { TokenSource } from '../lexer/token-source.js';
import {
  KEYWORDS,
  type SourceToken,
  SYMBOLS,
  TOKEN_TYPES,
} from '../token-types.js';
import { ParseTreeBuilder } from '../tree/parse-tree.js';
import type { Failure, Outcome } from './outcome.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted when a production starts */
export interface RuleStartEvent {
  rule: string;
  /** Buffer index of the first token the rule examines */
  index: number;
}

/** Event emitted when a production finishes */
export interface RuleEndEvent {
  rule: string;
  index: number;
  outcome: Outcome['type'];
}

/** Event emitted when a combinator rewinds the cursor */
export interface BacktrackEvent {
  from: number;
  to: number;
  failure: Failure;
}

export interface EngineCallbacks {
  /** Called before a production parses its body */
  onRuleStart?: ((event: RuleStartEvent) => void) | undefined;
  /** Called after a production matched or failed */
  onRuleEnd?: ((event: RuleEndEvent) => void) | undefined;
  /** Called when a failed attempt is rolled back */
  onBacktrack?: ((event: BacktrackEvent) => void) | undefined;
}

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly source: TokenSource;
  /** Every token pulled from the source so far */
  readonly buffer: SourceToken[];
  /** Index of the next unconsumed token in the buffer */
  pos: number;
  /**
   * The token at `pos` was pulled and failed validation. While set, the
   * source is not advanced again; the held token is revalidated instead.
   */
  pendingFailure: boolean;
  /** Failure at the highest buffer index seen so far */
  furthest: Failure | undefined;
  readonly tree: ParseTreeBuilder;
  readonly callbacks: EngineCallbacks;
}

export function createParserState(
  source: TokenSource,
  callbacks: EngineCallbacks = {}
): ParserState {
  return {
    source,
    buffer: [],
    pos: 0,
    pendingFailure: false,
    furthest: undefined,
    tree: new ParseTreeBuilder(),
    callbacks,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/**
 * Read the source's current token through its typed accessors.
 * @throws TypeError if the source yields a constant it has no accessor for
 */
function readCurrentToken(source: TokenSource): SourceToken {
  const type = source.tokenType();
  const span = source.currentSpan?.();

  switch (type) {
    case TOKEN_TYPES.KEYWORD:
      return { type, value: KEYWORDS[source.keyword()], span };
    case TOKEN_TYPES.SYMBOL:
      return { type, value: SYMBOLS[source.symbol()], span };
    case TOKEN_TYPES.IDENTIFIER:
      return { type, value: source.identifier(), span };
    case TOKEN_TYPES.INT_CONST: {
      const value = source.intVal?.();
      if (value === undefined) {
        throw new TypeError(
          'Token source yields integer constants but has no intVal()'
        );
      }
      return { type, value: String(value), span };
    }
    case TOKEN_TYPES.STRING_CONST: {
      const value = source.stringVal?.();
      if (value === undefined) {
        throw new TypeError(
          'Token source yields string constants but has no stringVal()'
        );
      }
      return { type, value, span };
    }
  }
}

/**
 * Token at `pos`, pulling one from the source when the buffer is used up.
 * Returns undefined once the source is exhausted.
 * @internal
 */
export function pullToken(state: ParserState): SourceToken | undefined {
  const buffered = state.buffer[state.pos];
  if (buffered) return buffered;
  if (!state.source.hasMoreTokens()) return undefined;
  state.source.advance();
  const token = readCurrentToken(state.source);
  state.buffer.push(token);
  return token;
}

/** Last token pulled from the source, for end-of-input locations */
export function lastPulledToken(state: ParserState): SourceToken | undefined {
  return state.buffer[state.buffer.length - 1];
}

/** @internal */
export function recordFailure(state: ParserState, failure: Failure): void {
  if (!state.furthest || failure.index >= state.furthest.index) {
    state.furthest = failure;
  }
}

// ============================================================
// SNAPSHOTS
// ============================================================

export interface Snapshot {
  readonly pos: number;
  readonly treeLength: number;
  readonly pendingFailure: boolean;
}

/** @internal */
export function snapshot(state: ParserState): Snapshot {
  return {
    pos: state.pos,
    treeLength: state.tree.length,
    pendingFailure: state.pendingFailure,
  };
}

/**
 * Rewind the cursor and drop tree events appended since `snap`.
 * @internal
 */
export function restore(
  state: ParserState,
  snap: Snapshot,
  failure: Failure
): void {
  const from = state.pos;
  const changed = from !== snap.pos || state.tree.length !== snap.treeLength;
  state.pos = snap.pos;
  state.tree.truncate(snap.treeLength);
  state.pendingFailure = snap.pendingFailure;
  if (changed) {
    state.callbacks.onBacktrack?.({ from, to: snap.pos, failure });
  }
}
