/**
 * Jack Error Classes and Factory
 * Structured error types with registry-based error IDs
 */

import type { SourceLocation } from './source-location.js';
import { formatLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface JackErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all analyzer errors.
 * The message carries a ` at line:column` suffix when a location is known.
 */
export class JackError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: JackErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'JackError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): JackErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: JackErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from its registry entry, rendering the message template
 * with `context`.
 *
 * @throws TypeError if errorId is not registered
 *
 * @example
 * createError('JACK-C001', { reason: 'format must be a string' })
 * // JackError: "Invalid configuration: format must be a string"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): JackError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new JackError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function requireCategory(errorId: string, category: string): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/** Tokenization errors; lexer errors always carry a location */
export class LexerError extends JackError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    requireCategory(errorId, 'lexer');
    const definition = ERROR_REGISTRY.get(errorId);
    super({
      errorId,
      message: renderMessage(definition?.messageTemplate ?? '', context),
      location,
      context,
    });
    this.name = 'LexerError';
    this.location = location;
  }
}

/**
 * Failure kinds reported by the grammar engine.
 * The `*NotFound` kinds mean "this alternative does not apply here";
 * the others mean the input is malformed or exhausted.
 */
export const FAILURE_KINDS = [
  'NoMoreTokens',
  'WrongKeyword',
  'KeywordNotFound',
  'WrongSymbol',
  'SymbolNotFound',
  'IdentifierNotFound',
  'IntegerConstantNotFound',
  'StringConstantNotFound',
  'TrailingTokens',
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

/** Registry error ID for each failure kind */
export const PARSE_ERROR_IDS: Readonly<Record<FailureKind, string>> = {
  NoMoreTokens: 'JACK-P001',
  WrongKeyword: 'JACK-P002',
  KeywordNotFound: 'JACK-P003',
  WrongSymbol: 'JACK-P004',
  SymbolNotFound: 'JACK-P005',
  IdentifierNotFound: 'JACK-P006',
  IntegerConstantNotFound: 'JACK-P007',
  StringConstantNotFound: 'JACK-P008',
  TrailingTokens: 'JACK-P009',
};

/** Parse-time errors */
export class ParseError extends JackError {
  readonly kind: FailureKind;

  constructor(
    kind: FailureKind,
    context: { expected: string; found?: string | undefined },
    location?: SourceLocation | undefined
  ) {
    const errorId = PARSE_ERROR_IDS[kind];
    requireCategory(errorId, 'parse');
    const definition = ERROR_REGISTRY.get(errorId);
    super({
      errorId,
      message: renderMessage(definition?.messageTemplate ?? '', context),
      location,
      context,
    });
    this.name = 'ParseError';
    this.kind = kind;
  }
}
