/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface FxErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all extraction errors.
 * Provides structured data for host applications to format as needed.
 */
export class FxError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: FxErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'FxError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): FxErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: FxErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function requireCategory(errorId: string, category: 'input' | 'parse'): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

/** The input ended while a multi-line construct was still open */
export class EarlyEndError extends FxError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'input');
    super({ errorId, message, context });
    this.name = 'EarlyEndError';
  }
}

/** A construct in the input is malformed */
export class ParsingError extends FxError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParsingError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Creates an error from the registry.
 *
 * Input errors become {@link EarlyEndError} and drop the location; parse
 * errors become {@link ParsingError}. Unknown ids throw `TypeError`.
 *
 * @example
 * createError("FX-P008", { close: ")" }, { line: 3, column: 12 })
 * // ParsingError: "Unmatched ) in extraction field at 3:12"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): FxError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  if (definition.category === 'input') {
    return new EarlyEndError(errorId, message, context);
  }
  return new ParsingError(
    errorId,
    message,
    location ?? { line: 0, column: 0 },
    context
  );
}
