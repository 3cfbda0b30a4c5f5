/**
 * Scanner Tests: Helpers
 * Literal prefixes, pp-numbers and continued lines
 */

import { describe, expect, it } from 'vitest';

import {
  parseLiteralPrefix,
  readContinuedLines,
  readNumber,
} from '../../src/scanner/helpers.js';
import {
  createCursor,
  createLineReader,
  peek,
} from '../../src/scanner/state.js';
import { EarlyEndError } from '../../src/index.js';

function cursorFor(text: string) {
  return createCursor(createLineReader(text));
}

describe('Scanner: Helpers', () => {
  describe('parseLiteralPrefix', () => {
    it('accepts f and x in either case', () => {
      expect(parseLiteralPrefix('f', '"')).toEqual({
        encoding: '',
        kind: 'f',
        isRaw: false,
      });
      expect(parseLiteralPrefix('X', '"')).toEqual({
        encoding: '',
        kind: 'x',
        isRaw: false,
      });
    });

    it('accepts the encoding before or after the kind', () => {
      expect(parseLiteralPrefix('u8fR', '"')).toEqual({
        encoding: 'u8',
        kind: 'f',
        isRaw: true,
      });
      expect(parseLiteralPrefix('xLR', '"')).toEqual({
        encoding: 'L',
        kind: 'x',
        isRaw: true,
      });
    });

    it('accepts plain encodings and R', () => {
      expect(parseLiteralPrefix('R', '"')).toEqual({
        encoding: '',
        kind: null,
        isRaw: true,
      });
      expect(parseLiteralPrefix('U', '"')).toEqual({
        encoding: 'U',
        kind: null,
        isRaw: false,
      });
    });

    it('rejects identifiers that are not prefixes', () => {
      expect(parseLiteralPrefix('foo', '"')).toBeNull();
      expect(parseLiteralPrefix('Rf', '"')).toBeNull();
      expect(parseLiteralPrefix('fx', '"')).toBeNull();
      expect(parseLiteralPrefix('u8u', '"')).toBeNull();
    });

    it('accepts only encodings before a character literal', () => {
      expect(parseLiteralPrefix('u8', "'")).toEqual({
        encoding: 'u8',
        kind: null,
        isRaw: false,
      });
      expect(parseLiteralPrefix('f', "'")).toBeNull();
      expect(parseLiteralPrefix('R', "'")).toBeNull();
    });
  });

  describe('readNumber', () => {
    it('reads digit separators', () => {
      const cursor = cursorFor("1'000'000;");
      expect(readNumber(cursor)).toBe("1'000'000");
      expect(peek(cursor)).toBe(';');
    });

    it('reads signed exponents and suffixes', () => {
      expect(readNumber(cursorFor('1.5e+10f)'))).toBe('1.5e+10f');
      expect(readNumber(cursorFor('0x1p-3 '))).toBe('0x1p-3');
      expect(readNumber(cursorFor('42ull,'))).toBe('42ull');
    });

    it('stops at a quote that is not a separator', () => {
      const cursor = cursorFor("1'");
      expect(readNumber(cursor)).toBe('1');
      expect(peek(cursor)).toBe("'");
    });
  });

  describe('readContinuedLines', () => {
    it('joins backslash-continued lines', () => {
      const cursor = cursorFor('#if A \\\n  && B\nnext');
      expect(readContinuedLines(cursor, 'a preprocessor directive')).toBe(
        '#if A \\\n  && B'
      );
      expect(cursor.line).toBe(2);
    });

    it('fails when the last line is continued', () => {
      const cursor = cursorFor('#if A \\');
      expect(() => readContinuedLines(cursor, 'a preprocessor directive')).toThrow(
        EarlyEndError
      );
    });
  });
});
