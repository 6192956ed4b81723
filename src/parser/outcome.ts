/**
 * Parse Outcomes
 * Tri-state result shared by terminal eaters, combinators and productions
 */

import type { FailureKind } from '../error-classes.js';
import type { SourceToken } from '../token-types.js';

/** What went wrong, and where in the token buffer */
export interface Failure {
  readonly kind: FailureKind;
  /** Description of what the grammar wanted, e.g. `symbol ';'` */
  readonly expected: string;
  /** Offending token; absent when input ran out */
  readonly found?: SourceToken | undefined;
  /** Buffer index of the offending token */
  readonly index: number;
}

export type Outcome =
  | { readonly type: 'matched' }
  | { readonly type: 'notApplicable'; readonly failure: Failure }
  | { readonly type: 'malformed'; readonly failure: Failure };

export type FailedOutcome = Exclude<Outcome, { type: 'matched' }>;

export const MATCHED: Outcome = Object.freeze({ type: 'matched' });

export function notApplicable(failure: Failure): FailedOutcome {
  return { type: 'notApplicable', failure };
}

export function malformed(failure: Failure): FailedOutcome {
  return { type: 'malformed', failure };
}

/** Kinds meaning "this alternative is absent here" rather than bad input */
export const RECOVERABLE_KINDS: ReadonlySet<FailureKind> = new Set<FailureKind>([
  'KeywordNotFound',
  'SymbolNotFound',
  'IdentifierNotFound',
  'IntegerConstantNotFound',
  'StringConstantNotFound',
]);

export function isRecoverableKind(kind: FailureKind): boolean {
  return RECOVERABLE_KINDS.has(kind);
}
