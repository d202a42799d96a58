// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position in source text. Line and column are 1-based. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
