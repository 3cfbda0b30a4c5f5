/**
 * Scanner Helper Functions
 * Character classification, token readers and literal prefix parsing
 */

import { createError } from '../error-classes.js';
import {
  advance,
  continuationAhead,
  type Cursor,
  hasNextLine,
  lineEndsWithContinuation,
  peek,
  takeRestOfLine,
} from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' || ch === '\t' || ch === '\r' || ch === '\f' || ch === '\v'
  );
}

export function readIdentifier(cursor: Cursor): string {
  let value = '';
  while (isIdentifierChar(peek(cursor))) {
    value += advance(cursor);
  }
  return value;
}

/** True when a pp-number starts at the cursor */
export function numberAhead(cursor: Cursor): boolean {
  const ch = peek(cursor);
  return isDigit(ch) || (ch === '.' && isDigit(peek(cursor, 1)));
}

/**
 * Read a preprocessing number. Digit separators (1'000) and signed
 * exponents (1e+5, 0x1p-3) are part of the number.
 */
export function readNumber(cursor: Cursor): string {
  let value = advance(cursor);
  for (;;) {
    const ch = peek(cursor);
    const next = peek(cursor, 1);
    if (
      (ch === 'e' || ch === 'E' || ch === 'p' || ch === 'P') &&
      (next === '+' || next === '-')
    ) {
      value += advance(cursor) + advance(cursor);
    } else if (ch === "'" && isIdentifierChar(next)) {
      value += advance(cursor) + advance(cursor);
    } else if (isIdentifierChar(ch) || ch === '.') {
      value += advance(cursor);
    } else {
      return value;
    }
  }
}

/**
 * Copy a backslash line continuation including the line break.
 * @param construct - Named in the error when the input ends after the backslash
 */
export function readContinuation(cursor: Cursor, construct: string): string {
  const value = takeRestOfLine(cursor);
  if (!hasNextLine(cursor)) {
    throw createError('FX-I002', { construct });
  }
  return value + advance(cursor);
}

/**
 * Copy the rest of the line and every line joined to it by a trailing
 * backslash. The cursor is left at the end of the last line.
 */
export function readContinuedLines(cursor: Cursor, construct: string): string {
  let value = '';
  for (;;) {
    const continued = lineEndsWithContinuation(cursor);
    value += takeRestOfLine(cursor);
    if (!continued) return value;
    if (!hasNextLine(cursor)) {
      throw createError('FX-I002', { construct });
    }
    value += advance(cursor);
  }
}

/** Copy a backslash and what it escapes, or a whole continuation */
export function readEscape(cursor: Cursor, construct: string): string {
  if (continuationAhead(cursor)) {
    return readContinuation(cursor, construct);
  }
  return advance(cursor) + advance(cursor);
}

// ============================================================
// LITERAL PREFIXES
// ============================================================

export type LiteralEncoding = '' | 'u8' | 'u' | 'U' | 'L';
export type ExtractionKind = 'f' | 'x';

export interface LiteralPrefix {
  readonly encoding: LiteralEncoding;
  readonly kind: ExtractionKind | null;
  readonly isRaw: boolean;
}

export const PLAIN_PREFIX: LiteralPrefix = {
  encoding: '',
  kind: null,
  isRaw: false,
};

const STRING_PREFIX = /^(?:(u8|[uUL])?([fFxX])?|([fFxX])(u8|[uUL]))(R)?$/;
const CHAR_PREFIX = /^(u8|[uUL])?$/;

function toEncoding(text: string | undefined): LiteralEncoding {
  switch (text) {
    case 'u8':
    case 'u':
    case 'U':
    case 'L':
      return text;
    default:
      return '';
  }
}

function toKind(text: string | undefined): ExtractionKind | null {
  switch (text) {
    case 'f':
    case 'F':
      return 'f';
    case 'x':
    case 'X':
      return 'x';
    default:
      return null;
  }
}

/**
 * Interpret the identifier directly before a quote as a literal prefix.
 * The encoding and the f/x letter may come in either order; R is last.
 * Character literals take an encoding only.
 *
 * @returns null when the identifier is not a prefix
 */
export function parseLiteralPrefix(
  identifier: string,
  quote: string
): LiteralPrefix | null {
  if (quote === "'") {
    const match = CHAR_PREFIX.exec(identifier);
    if (!match) return null;
    return { encoding: toEncoding(match[1]), kind: null, isRaw: false };
  }

  const match = STRING_PREFIX.exec(identifier);
  if (!match) return null;
  return {
    encoding: toEncoding(match[1] ?? match[4]),
    kind: toKind(match[2] ?? match[3]),
    isRaw: match[5] !== undefined,
  };
}
