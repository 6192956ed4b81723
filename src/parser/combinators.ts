/**
 * Parser Combinators
 * Advance-and-validate, sequencing, repetition and ordered alternation
 */

import {
  isRecoverableKind,
  malformed,
  MATCHED,
  notApplicable,
  type Outcome,
} from './outcome.js';
import {
  type ParserState,
  pullToken,
  recordFailure,
  restore,
  snapshot,
} from './state.js';
import type { TerminalEater } from './terminals.js';

/** A grammar element parsed against the shared state */
export type Step = (state: ParserState) => Outcome;

// ============================================================
// ADVANCE AND VALIDATE
// ============================================================

/**
 * Pull the next token (unless a failed one is still held) and validate it.
 * A match consumes the token; a mismatch leaves it held with the
 * pending-failure flag set. Running out of tokens is always malformed.
 */
export function takeNextToken(
  state: ParserState,
  eater: TerminalEater
): Outcome {
  const token = state.pendingFailure
    ? state.buffer[state.pos]
    : pullToken(state);

  if (!token) {
    const failure = {
      kind: 'NoMoreTokens' as const,
      expected: eater.expected,
      index: state.pos,
    };
    recordFailure(state, failure);
    return malformed(failure);
  }

  const outcome = eater.eat(state, token);
  if (outcome.type === 'matched') {
    state.pos++;
    state.pendingFailure = false;
  } else {
    state.pendingFailure = true;
    recordFailure(state, outcome.failure);
  }
  return outcome;
}

/** Step form of `takeNextToken` */
export function take(eater: TerminalEater): Step {
  return (state) => takeNextToken(state, eater);
}

// ============================================================
// SEQUENCING
// ============================================================

/**
 * Run steps in order. A failure on the first token examined means the
 * sequence does not apply. Once a token has been consumed, only the
 * `*NotFound` kinds stay recoverable; a wrong keyword or symbol is
 * malformed input.
 */
export function sequence(...steps: Step[]): Step {
  return (state) => {
    const start = state.pos;
    for (const step of steps) {
      const outcome = step(state);
      if (outcome.type === 'matched') continue;
      if (
        outcome.type === 'notApplicable' &&
        outcome.failure.index > start &&
        !isRecoverableKind(outcome.failure.kind)
      ) {
        return malformed(outcome.failure);
      }
      return outcome;
    }
    return MATCHED;
  };
}

/**
 * Grammar rule: the sequence bracketed by `<name>` and `</name>`.
 * On failure the closing tag is not written; the enclosing combinator
 * truncates the partial events when it backtracks.
 */
export function rule(name: string, ...steps: Step[]): Step {
  const body = sequence(...steps);
  return (state) => {
    const index = state.pos;
    state.callbacks.onRuleStart?.({ rule: name, index });
    state.tree.open(name);
    const outcome = body(state);
    if (outcome.type === 'matched') {
      state.tree.close(name);
    }
    state.callbacks.onRuleEnd?.({ rule: name, index, outcome: outcome.type });
    return outcome;
  };
}

/**
 * Report `expected` instead of the inner expectation when `step` fails at
 * its first token (including end of input there).
 */
export function expecting(expected: string, step: Step): Step {
  return (state) => {
    const start = state.pos;
    const outcome = step(state);
    if (outcome.type === 'matched' || outcome.failure.index !== start) {
      return outcome;
    }
    const failure = { ...outcome.failure, expected };
    return outcome.type === 'malformed'
      ? malformed(failure)
      : notApplicable(failure);
  };
}

// ============================================================
// REPETITION
// ============================================================

/**
 * Apply `step` until it does not apply. The failed attempt is rolled back,
 * so the token that stopped the loop is left for the next step.
 */
export function zeroOrMore(step: Step): Step {
  return (state) => {
    for (;;) {
      const snap = snapshot(state);
      const outcome = step(state);
      if (outcome.type === 'malformed') return outcome;
      if (outcome.type === 'notApplicable') {
        restore(state, snap, outcome.failure);
        return MATCHED;
      }
      // a match that consumed nothing would repeat forever
      if (state.pos === snap.pos) return MATCHED;
    }
  };
}

/** Apply `step` at most once */
export function zeroOrOne(step: Step): Step {
  return (state) => {
    const snap = snapshot(state);
    const outcome = step(state);
    if (outcome.type === 'notApplicable') {
      restore(state, snap, outcome.failure);
      return MATCHED;
    }
    return outcome;
  };
}

// ============================================================
// ALTERNATION
// ============================================================

/**
 * Try alternatives in order from the same position. Returns the first
 * match or malformed outcome; when none applies, the last failure.
 */
export function or(first: Step, ...rest: Step[]): Step {
  return (state) => {
    const snap = snapshot(state);
    let outcome: Outcome = first(state);
    for (const alternative of rest) {
      if (outcome.type !== 'notApplicable') return outcome;
      restore(state, snap, outcome.failure);
      outcome = alternative(state);
    }
    if (outcome.type === 'notApplicable') {
      restore(state, snap, outcome.failure);
    }
    return outcome;
  };
}
