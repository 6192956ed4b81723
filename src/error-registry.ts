/**
 * Error Registry
 * Error definitions keyed by error ID, with message templates.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'config';

/** Registry entry describing a single error condition */
export interface ErrorDefinition {
  /** Format: JACK-{L|P|C}{3-digit} (e.g., JACK-P004) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new Error(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (JACK-L0xx)
  {
    errorId: 'JACK-L001',
    category: 'lexer',
    messageTemplate: 'Unterminated string constant',
  },
  {
    errorId: 'JACK-L002',
    category: 'lexer',
    messageTemplate: "Unexpected character '{char}'",
  },
  {
    errorId: 'JACK-L003',
    category: 'lexer',
    messageTemplate: 'Integer constant {value} is out of range (0..{max})',
  },
  {
    errorId: 'JACK-L004',
    category: 'lexer',
    messageTemplate: 'Unterminated block comment',
  },

  // Parse Errors (JACK-P0xx)
  {
    errorId: 'JACK-P001',
    category: 'parse',
    messageTemplate: 'Unexpected end of input, expected {expected}',
  },
  {
    errorId: 'JACK-P002',
    category: 'parse',
    messageTemplate: 'Expected {expected}, found {found}',
  },
  {
    errorId: 'JACK-P003',
    category: 'parse',
    messageTemplate: 'Expected {expected}, found {found}',
  },
  {
    errorId: 'JACK-P004',
    category: 'parse',
    messageTemplate: 'Expected {expected}, found {found}',
  },
  {
    errorId: 'JACK-P005',
    category: 'parse',
    messageTemplate: 'Expected {expected}, found {found}',
  },
  {
    errorId: 'JACK-P006',
    category: 'parse',
    messageTemplate: 'Expected {expected}, found {found}',
  },
  {
    errorId: 'JACK-P007',
    category: 'parse',
    messageTemplate: 'Expected {expected}, found {found}',
  },
  {
    errorId: 'JACK-P008',
    category: 'parse',
    messageTemplate: 'Expected {expected}, found {found}',
  },
  {
    errorId: 'JACK-P009',
    category: 'parse',
    messageTemplate: 'Unexpected {found} after end of class',
  },
  {
    errorId: 'JACK-P010',
    category: 'parse',
    messageTemplate:
      'CompilationEngine already ran {rule}; create a new engine per parse',
  },

  // Configuration and CLI Errors (JACK-C0xx)
  {
    errorId: 'JACK-C001',
    category: 'config',
    messageTemplate: 'Invalid configuration: {reason}',
  },
  {
    errorId: 'JACK-C002',
    category: 'config',
    messageTemplate: '{reason}',
  },
];

/** Read-only registry initialized at module load */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Replace `{name}` placeholders with context values.
 * Missing values render as empty strings; other values go through String().
 *
 * @example
 * renderMessage('Expected {expected}, found {found}', { expected: "symbol ';'", found: "symbol ')'" })
 * // "Expected symbol ';', found symbol ')'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = context[name];
    return value === undefined ? '' : String(value);
  });
}
