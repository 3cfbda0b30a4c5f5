/**
 * Extraction Field Readers
 * Field expressions, format specs and debug labels
 */

import { createError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import {
  blockCommentAhead,
  lineCommentAhead,
  readBlockComment,
  readLineComment,
} from './comments.js';
import type { ScanContext } from './context.js';
import {
  isIdentifierStart,
  numberAhead,
  parseLiteralPrefix,
  PLAIN_PREFIX,
  readEscape,
  readIdentifier,
  readNumber,
} from './helpers.js';
import { readLiteral } from './literals.js';
import {
  advance,
  type Cursor,
  currentLocation,
  END_OF_INPUT,
  END_OF_LINE,
  peek,
  peekString,
} from './state.js';
import type { ExtractionField, LiteralBody } from './types.js';

const CLOSER_OF: Record<string, string> = {
  '(': ')',
  '[': ']',
  '{': '}',
};

function isQuote(ch: string): boolean {
  return ch === '"' || ch === "'";
}

function terminatorAhead(cursor: Cursor, body: LiteralBody): boolean {
  return peekString(cursor, body.terminator.length) === body.terminator;
}

export interface FieldExpression {
  readonly start: SourceLocation;
  readonly expression: string;
  /** The character the expression stopped at, not consumed */
  readonly stop: ':' | '}';
}

/**
 * Scan a field expression, starting after its opening brace. Stops at the
 * first `}` or spec `:` outside brackets and conditional operators.
 */
export function readFieldExpression(
  context: ScanContext,
  body: LiteralBody
): FieldExpression {
  const { cursor } = context;
  const start = currentLocation(cursor);
  const openers: string[] = [];
  let ternaries = 0;
  let expression = '';

  for (;;) {
    const ch = peek(cursor);

    if (ch === END_OF_INPUT) {
      throw createError('FX-I005', {});
    }
    if (ch === END_OF_LINE) {
      if (!body.isRaw) {
        throw createError('FX-P006', {}, currentLocation(cursor));
      }
      expression += advance(cursor);
      continue;
    }

    // `::` is scope resolution at any depth, never a spec colon
    if (ch === ':' && peek(cursor, 1) === ':') {
      expression += advance(cursor) + advance(cursor);
      continue;
    }

    const top = openers[openers.length - 1];
    if (top === undefined) {
      if (ch === '}') {
        if (ternaries > 0) {
          throw createError(
            'FX-P011',
            { count: ternaries },
            currentLocation(cursor)
          );
        }
        return { start, expression, stop: '}' };
      }
      if (ch === ':') {
        if (ternaries === 0) {
          return { start, expression, stop: ':' };
        }
        ternaries--;
        expression += advance(cursor);
        continue;
      }
      if (ch === '?') {
        ternaries++;
        expression += advance(cursor);
        continue;
      }
      if (ch === ')' || ch === ']') {
        throw createError('FX-P008', { close: ch }, currentLocation(cursor));
      }
    }

    const closer = CLOSER_OF[ch];
    if (closer !== undefined) {
      openers.push(ch);
      expression += advance(cursor);
      continue;
    }
    if (top !== undefined && (ch === ')' || ch === ']' || ch === '}')) {
      if (CLOSER_OF[top] !== ch) {
        throw createError(
          'FX-P007',
          { open: top, close: ch },
          currentLocation(cursor)
        );
      }
      openers.pop();
      expression += advance(cursor);
      continue;
    }

    if (ch === '\\' && !body.isRaw) {
      expression += readEscape(cursor, 'an extraction field');
    } else if (blockCommentAhead(cursor)) {
      expression += readBlockComment(
        cursor,
        body.isRaw ? 'allow' : 'continuation-only'
      );
    } else if (lineCommentAhead(cursor)) {
      expression += readLineComment(cursor);
    } else if (isQuote(ch)) {
      expression += readLiteral(context, PLAIN_PREFIX);
    } else if (isIdentifierStart(ch)) {
      const identifier = readIdentifier(cursor);
      const next = peek(cursor);
      const prefix = isQuote(next) ? parseLiteralPrefix(identifier, next) : null;
      expression += prefix ? readLiteral(context, prefix) : identifier;
    } else if (numberAhead(cursor)) {
      expression += readNumber(cursor);
    } else {
      expression += advance(cursor);
    }
  }
}

export interface FormatSpec {
  /** Spec text including the leading colon, nested fields as {} */
  readonly spec: string;
  readonly nested: ExtractionField[];
}

/** Copy a format spec starting at its colon; the closing `}` is left unread */
export function readFormatSpec(
  context: ScanContext,
  body: LiteralBody
): FormatSpec {
  const { cursor } = context;
  const nested: ExtractionField[] = [];
  let spec = advance(cursor);

  for (;;) {
    const ch = peek(cursor);

    if (ch === END_OF_INPUT) {
      throw createError('FX-I006', {});
    }
    if (ch === END_OF_LINE) {
      if (!body.isRaw) {
        throw createError('FX-P012', {}, currentLocation(cursor));
      }
      spec += advance(cursor);
      continue;
    }
    if (ch === '}') {
      return { spec, nested };
    }

    if (body.isRaw) {
      if (ch === ')' && terminatorAhead(cursor, body)) {
        throw createError('FX-P010', {}, currentLocation(cursor));
      }
    } else if (ch === body.quote) {
      throw createError('FX-P010', {}, currentLocation(cursor));
    } else if (ch === '\\') {
      spec += readEscape(cursor, 'a format specification');
      continue;
    }

    if (ch === '{') {
      advance(cursor);
      nested.push(readField(context, body, true).field);
      spec += '{}';
      continue;
    }

    spec += advance(cursor);
  }
}

// ============================================================
// DEBUG LABELS
// ============================================================

/** Encode field text so it reads back as itself inside the literal */
export function encodeLabel(text: string, body: LiteralBody): string {
  const joined = text.replace(/\\[ \t\r\f\v]*\n/g, '');
  const braced = joined.replace(/[{}]/g, '$&$&');
  return body.isRaw ? braced : braced.replace(/[\\"]/g, '\\$&');
}

/**
 * False when an encoded label cannot sit in the literal: a raw line break in
 * a non-raw literal, or text completing the raw terminator.
 *
 * @param preceding - Literal text already written before the field
 */
export function labelFits(
  label: string,
  preceding: string,
  body: LiteralBody
): boolean {
  if (!body.isRaw) return !label.includes('\n');
  const tail = preceding.slice(1 - body.terminator.length);
  return !(tail + label).includes(body.terminator);
}

/**
 * Split a trailing `=` off a field expression.
 * @returns null when the expression has no debug marker
 */
export function splitDebugLabel(
  expression: string
): { argument: string; label: string } | null {
  const trimmed = expression.trimEnd();
  if (!trimmed.endsWith('=')) return null;
  return { argument: trimmed.slice(0, -1).trimEnd(), label: expression };
}

// ============================================================
// FIELDS
// ============================================================

export interface ReadField {
  readonly field: ExtractionField;
  /** Replacement text for the field inside the literal */
  readonly placeholder: string;
}

/**
 * Read a whole field after its opening brace, consuming the closing brace.
 * Fields nested in a format spec may not have a spec of their own and get
 * no debug label.
 */
export function readField(
  context: ScanContext,
  body: LiteralBody,
  inFormatSpec: boolean
): ReadField {
  const { cursor } = context;
  const { start, expression, stop } = readFieldExpression(context, body);

  let spec = '';
  let nested: ExtractionField[] = [];
  if (stop === ':') {
    if (inFormatSpec) {
      throw createError('FX-P009', {}, currentLocation(cursor));
    }
    ({ spec, nested } = readFormatSpec(context, body));
  }
  advance(cursor);

  const debug = inFormatSpec ? null : splitDebugLabel(expression);
  const argument = debug ? debug.argument : expression;
  if (argument.trim() === '') {
    throw createError('FX-P014', {}, start);
  }

  const label = debug ? encodeLabel(debug.label, body) : null;
  return {
    field: { start, expression: argument, label, nested },
    placeholder: `${label ?? ''}{${spec}}`,
  };
}
