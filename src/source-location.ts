// ============================================================
// SOURCE LOCATION
// ============================================================

/** 1-based line and column in the original input */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
}
