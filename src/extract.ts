/**
 * Extraction Driver
 * Copies input to output line by line, rewriting extraction literals
 */

import { createError } from './error-classes.js';
import { type ExtractOptions, resolveOptions } from './options.js';
import {
  blockCommentAhead,
  lineCommentAhead,
  readBlockComment,
  readLineComment,
} from './scanner/comments.js';
import { createScanContext, type ScanContext } from './scanner/context.js';
import {
  isIdentifierChar,
  isIdentifierStart,
  isWhitespace,
  numberAhead,
  parseLiteralPrefix,
  PLAIN_PREFIX,
  readContinuedLines,
  readIdentifier,
  readNumber,
} from './scanner/helpers.js';
import { readLiteral } from './scanner/literals.js';
import {
  advance,
  createCursor,
  createLineReader,
  END_OF_INPUT,
  END_OF_LINE,
  lineEndsWithContinuation,
  type LineReader,
  type OutputSink,
  peek,
} from './scanner/state.js';

const DIRECTIVE = 'a preprocessor directive';

/** Name of the directive on the current line, or null for other lines */
function directiveAhead(context: ScanContext): string | null {
  const { cursor } = context;
  let offset = 0;
  while (isWhitespace(peek(cursor, offset))) offset++;
  if (peek(cursor, offset) !== '#') return null;
  offset++;
  while (isWhitespace(peek(cursor, offset))) offset++;

  let name = '';
  while (isIdentifierChar(peek(cursor, offset))) {
    name += peek(cursor, offset);
    offset++;
  }
  return name;
}

/**
 * Handle the start of a line. #define lines are scanned like code with
 * location markers off; other directives are copied with their
 * continuation lines.
 */
function readLineStart(context: ScanContext): string {
  const name = directiveAhead(context);
  if (name === null) return '';
  if (name === 'define') {
    context.inDirective = true;
    return '';
  }
  return readContinuedLines(context.cursor, DIRECTIVE);
}

function readToken(context: ScanContext): string {
  const { cursor } = context;
  const ch = peek(cursor);

  if (blockCommentAhead(cursor)) {
    return readBlockComment(cursor, 'allow');
  }
  if (lineCommentAhead(cursor)) {
    return readLineComment(cursor);
  }
  if (isIdentifierStart(ch)) {
    const identifier = readIdentifier(cursor);
    const next = peek(cursor);
    if (next === '"' || next === "'") {
      const prefix = parseLiteralPrefix(identifier, next);
      if (prefix) return readLiteral(context, prefix);
    }
    return identifier;
  }
  if (ch === '"' || ch === "'") {
    return readLiteral(context, PLAIN_PREFIX);
  }
  if (numberAhead(cursor)) {
    return readNumber(cursor);
  }
  return advance(cursor);
}

/**
 * Rewrite every extraction literal read from `reader`, writing each
 * finished line to `sink`. Lines written before an error stay written.
 *
 * @throws EarlyEndError when the input ends inside a construct
 * @throws ParsingError when a construct is malformed
 */
export function extractStream(
  reader: LineReader,
  sink: OutputSink,
  options?: ExtractOptions
): void {
  const context = createScanContext(
    createCursor(reader),
    resolveOptions(options)
  );
  const { cursor } = context;
  let pending = '';
  let atLineStart = true;

  for (;;) {
    if (atLineStart) {
      atLineStart = false;
      pending += readLineStart(context);
    }

    const ch = peek(cursor);
    if (ch === END_OF_INPUT) {
      if (context.inDirective && lineEndsWithContinuation(cursor)) {
        throw createError('FX-I002', { construct: DIRECTIVE });
      }
      sink.write(pending);
      return;
    }
    if (ch === END_OF_LINE) {
      const continued = lineEndsWithContinuation(cursor);
      if (!continued) context.inDirective = false;
      advance(cursor);
      sink.write(`${pending}\n`);
      pending = '';
      atLineStart = !continued;
      continue;
    }

    pending += readToken(context);
  }
}

/** Rewrite every extraction literal in `source` */
export function extract(source: string, options?: ExtractOptions): string {
  const chunks: string[] = [];
  extractStream(
    createLineReader(source),
    { write: (chunk) => chunks.push(chunk) },
    options
  );
  return chunks.join('');
}
