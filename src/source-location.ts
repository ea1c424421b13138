// ============================================================
// SOURCE LOCATION
// ============================================================

/** 1-based line and column; offset counts code points from stream start */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
