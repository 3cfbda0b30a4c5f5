/**
 * Scanner State
 * Line-buffered cursor over the input with one line of lookahead
 */

import type { SourceLocation } from '../source-location.js';

/** Yields physical lines without their terminating newline */
export interface LineReader {
  readLine(): string | undefined;
}

/** Receives output as it becomes final */
export interface OutputSink {
  write(chunk: string): void;
}

/** Returned by peek/advance when the cursor sits at the end of a line that has a successor */
export const END_OF_LINE = '\n';
/** Returned by peek/advance once the last line is exhausted */
export const END_OF_INPUT = '';

/**
 * Split text into lines the way a line reader sees them. Text ending in a
 * newline yields a final empty line, so joining the lines with '\n' gives
 * the text back.
 */
export function createLineReader(text: string): LineReader {
  const lines = text.split('\n');
  let index = 0;
  return {
    readLine(): string | undefined {
      if (index >= lines.length) return undefined;
      const line = lines[index] ?? '';
      index++;
      return line;
    },
  };
}

export interface Cursor {
  readonly reader: LineReader;
  /** Current physical line */
  text: string;
  pos: number;
  /** 1-based number of the current line */
  line: number;
  /** Next line, prefetched so the last line can be recognized */
  upcoming: string | undefined;
}

export function createCursor(reader: LineReader): Cursor {
  const text = reader.readLine() ?? '';
  return {
    reader,
    text,
    pos: 0,
    line: 1,
    upcoming: reader.readLine(),
  };
}

export function currentLocation(cursor: Cursor): SourceLocation {
  return { line: cursor.line, column: cursor.pos + 1 };
}

export function hasNextLine(cursor: Cursor): boolean {
  return cursor.upcoming !== undefined;
}

export function peek(cursor: Cursor, offset = 0): string {
  const index = cursor.pos + offset;
  if (index < cursor.text.length) {
    return cursor.text[index] ?? END_OF_INPUT;
  }
  if (index === cursor.text.length && hasNextLine(cursor)) {
    return END_OF_LINE;
  }
  return END_OF_INPUT;
}

/** Lookahead within the current line only */
export function peekString(cursor: Cursor, length: number): string {
  return cursor.text.slice(cursor.pos, cursor.pos + length);
}

export function advance(cursor: Cursor): string {
  if (cursor.pos < cursor.text.length) {
    const ch = cursor.text[cursor.pos] ?? END_OF_INPUT;
    cursor.pos++;
    return ch;
  }
  if (cursor.upcoming !== undefined) {
    cursor.text = cursor.upcoming;
    cursor.upcoming = cursor.reader.readLine();
    cursor.pos = 0;
    cursor.line++;
    return END_OF_LINE;
  }
  return END_OF_INPUT;
}

/** Consume and return the rest of the current line, leaving the cursor at its end */
export function takeRestOfLine(cursor: Cursor): string {
  const rest = cursor.text.slice(cursor.pos);
  cursor.pos = cursor.text.length;
  return rest;
}

/** True when the current line's last non-whitespace character is a backslash */
export function lineEndsWithContinuation(cursor: Cursor): boolean {
  return /\\\s*$/.test(cursor.text);
}

/** True when the cursor is at a backslash followed only by whitespace */
export function continuationAhead(cursor: Cursor): boolean {
  return /^\\\s*$/.test(cursor.text.slice(cursor.pos));
}
