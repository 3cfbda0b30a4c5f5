/**
 * Extraction Options
 * Caller-facing options, defaults and validation
 */

import type { SourceLocation } from './source-location.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Reported once per rewritten extraction literal */
export interface LiteralEvent {
  readonly kind: 'f' | 'x';
  /** Location of the literal's first prefix character */
  readonly location: SourceLocation;
  readonly argumentCount: number;
  /** Function wrapped around an f literal; null for x literals */
  readonly callee: string | null;
}

/**
 * Observability callbacks for monitoring extraction.
 * All callbacks are optional.
 */
export interface ObservabilityCallbacks {
  onLiteral?: (event: LiteralEvent) => void;
}

// ============================================================
// OPTIONS
// ============================================================

export const DEFAULT_FUNCTION_NAME = 'std::format';
export const DEFAULT_SOURCE_PATH = '<stdin>';

export interface ExtractOptions {
  /** Function wrapped around f literals. A trailing `*` becomes the argument count. */
  functionName?: string | undefined;
  /** Insert `#line` markers so diagnostics point at the original columns */
  emitLocationMarkers?: boolean | undefined;
  /** Path written into location markers */
  sourcePath?: string | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

export interface ResolvedExtractOptions {
  readonly functionName: string;
  readonly emitLocationMarkers: boolean;
  readonly sourcePath: string;
  readonly observability: ObservabilityCallbacks;
}

/**
 * Apply defaults and validate.
 * @throws Error if the function name is empty
 */
export function resolveOptions(
  options: ExtractOptions = {}
): ResolvedExtractOptions {
  const functionName = options.functionName ?? DEFAULT_FUNCTION_NAME;
  if (functionName.trim() === '') {
    throw new Error('Invalid options: functionName must not be empty');
  }

  return {
    functionName,
    emitLocationMarkers: options.emitLocationMarkers ?? false,
    sourcePath: options.sourcePath ?? DEFAULT_SOURCE_PATH,
    observability: options.observability ?? {},
  };
}
