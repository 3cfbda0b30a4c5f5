/**
 * Comment Readers
 * Copy // and block comments verbatim
 */

import { createError } from '../error-classes.js';
import { readContinuation, readContinuedLines } from './helpers.js';
import {
  advance,
  continuationAhead,
  type Cursor,
  currentLocation,
  END_OF_INPUT,
  END_OF_LINE,
  peek,
} from './state.js';

export function blockCommentAhead(cursor: Cursor): boolean {
  return peek(cursor) === '/' && peek(cursor, 1) === '*';
}

export function lineCommentAhead(cursor: Cursor): boolean {
  return peek(cursor) === '/' && peek(cursor, 1) === '/';
}

/**
 * How a block comment may cross lines.
 * - allow: line breaks are copied
 * - continuation-only: only backslash continuations may end a line
 */
export type LineBreakPolicy = 'allow' | 'continuation-only';

/** Read a block comment starting at the cursor */
export function readBlockComment(
  cursor: Cursor,
  policy: LineBreakPolicy
): string {
  let value = advance(cursor) + advance(cursor);

  for (;;) {
    const ch = peek(cursor);
    if (ch === END_OF_INPUT) {
      throw createError('FX-I001', {});
    }
    if (ch === '*' && peek(cursor, 1) === '/') {
      return value + advance(cursor) + advance(cursor);
    }
    if (policy === 'continuation-only') {
      if (ch === END_OF_LINE) {
        throw createError('FX-P006', {}, currentLocation(cursor));
      }
      if (ch === '\\' && continuationAhead(cursor)) {
        value += readContinuation(cursor, 'a comment');
        continue;
      }
    }
    value += advance(cursor);
  }
}

/**
 * Read a // comment to the end of its line, following backslash
 * continuations. The cursor is left at the end of the last line.
 */
export function readLineComment(cursor: Cursor): string {
  return readContinuedLines(cursor, 'a // comment');
}
