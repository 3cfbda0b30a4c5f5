/**
 * Literal Scanner
 * Character, string and raw literals, and the extraction loop over their bodies
 */

import { createError } from '../error-classes.js';
import { assembleLiteral } from './assemble.js';
import type { ScanContext } from './context.js';
import { labelFits, readField } from './fields.js';
import {
  isIdentifierStart,
  isWhitespace,
  type LiteralPrefix,
  readEscape,
} from './helpers.js';
import {
  advance,
  type Cursor,
  currentLocation,
  END_OF_INPUT,
  END_OF_LINE,
  peek,
  peekString,
} from './state.js';
import type { ExtractionField, LiteralBody, ScannedLiteral } from './types.js';

export const MAX_DELIMITER_LENGTH = 16;

function describeLiteral(quote: string): string {
  return quote === "'" ? 'character' : 'string';
}

/** Read a raw literal delimiter and the ( after it */
function readRawDelimiter(cursor: Cursor): string {
  const start = currentLocation(cursor);
  let delimiter = '';

  for (;;) {
    const ch = peek(cursor);
    if (ch === END_OF_INPUT) {
      throw createError('FX-I007', {});
    }
    if (ch === END_OF_LINE) {
      throw createError('FX-P002', {}, currentLocation(cursor));
    }
    if (ch === '(') {
      advance(cursor);
      return delimiter;
    }
    if (ch === ')' || ch === '\\' || isWhitespace(ch)) {
      throw createError(
        'FX-P003',
        { char: JSON.stringify(ch) },
        currentLocation(cursor)
      );
    }
    delimiter += advance(cursor);
    if (delimiter.length > MAX_DELIMITER_LENGTH) {
      throw createError('FX-P004', { delimiter }, start);
    }
  }
}

/**
 * Scan the body of a literal up to and including its terminator. In
 * extraction literals fields are replaced by placeholders and collected.
 */
function readBody(
  context: ScanContext,
  prefix: LiteralPrefix,
  body: LiteralBody,
  fields: ExtractionField[]
): string {
  const { cursor } = context;
  const literal = describeLiteral(body.quote);
  let text = '';

  for (;;) {
    const ch = peek(cursor);

    if (body.isRaw) {
      if (ch === END_OF_INPUT) {
        throw createError('FX-I004', { delimiter: body.delimiter });
      }
      if (
        ch === ')' &&
        peekString(cursor, body.terminator.length) === body.terminator
      ) {
        for (let i = 0; i < body.terminator.length; i++) advance(cursor);
        return text + body.terminator;
      }
    } else {
      if (ch === END_OF_INPUT) {
        throw createError('FX-I003', { literal });
      }
      if (ch === END_OF_LINE) {
        throw createError('FX-P001', { literal }, currentLocation(cursor));
      }
      if (ch === body.quote) {
        return text + advance(cursor);
      }
      if (ch === '\\') {
        text += readEscape(cursor, `a ${literal} literal`);
        continue;
      }
    }

    if (prefix.kind !== null && ch === '{') {
      advance(cursor);
      if (peek(cursor) === '{') {
        advance(cursor);
        text += '{';
        continue;
      }
      const { field, placeholder } = readField(context, body, false);
      if (field.label !== null && !labelFits(field.label, text, body)) {
        throw createError('FX-P013', {}, field.start);
      }
      fields.push(field);
      text += placeholder;
      continue;
    }
    if (prefix.kind !== null && ch === '}') {
      const location = currentLocation(cursor);
      advance(cursor);
      if (peek(cursor) !== '}') {
        throw createError('FX-P005', {}, location);
      }
      advance(cursor);
      text += '}';
      continue;
    }

    text += advance(cursor);
  }
}

/**
 * Scan a literal whose prefix has already been read; the cursor is at the
 * opening quote.
 */
export function scanLiteral(
  context: ScanContext,
  prefix: LiteralPrefix
): ScannedLiteral {
  const { cursor } = context;
  const quoteAt = currentLocation(cursor);
  const start = {
    line: quoteAt.line,
    column: Math.max(
      1,
      quoteAt.column - prefix.encoding.length - (prefix.isRaw ? 1 : 0)
    ),
  };

  const quote = advance(cursor);
  const delimiter = prefix.isRaw ? readRawDelimiter(cursor) : '';
  const body: LiteralBody = {
    isRaw: prefix.isRaw,
    quote,
    delimiter,
    terminator: prefix.isRaw ? `)${delimiter}${quote}` : quote,
  };

  const fields: ExtractionField[] = [];
  const opening = prefix.isRaw ? `R${quote}${delimiter}(` : quote;
  const text = opening + readBody(context, prefix, body, fields);
  if (prefix.kind !== null && isIdentifierStart(peek(cursor))) {
    throw createError('FX-P015', {}, currentLocation(cursor));
  }

  return {
    prefix,
    body,
    text,
    fields,
    start,
    end: currentLocation(cursor),
  };
}

/** Scan a literal and return its replacement text */
export function readLiteral(context: ScanContext, prefix: LiteralPrefix): string {
  return assembleLiteral(context, scanLiteral(context, prefix));
}
