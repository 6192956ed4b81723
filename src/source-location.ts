// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position in Jack source text (line and column are 1-based) */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  /** Zero-based character offset */
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Render a location as `line:column` */
export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
