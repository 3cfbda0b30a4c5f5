/**
 * Error Tests: Registry, rendering and error classes
 */

import { describe, expect, it } from 'vitest';

import {
  createError,
  EarlyEndError,
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  FxError,
  ParsingError,
  renderMessage,
} from '../../src/index.js';

describe('Errors: Registry', () => {
  it('uses FX-I ids for input errors and FX-P ids for parse errors', () => {
    for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
      expect(errorId).toMatch(ERROR_ID_PATTERN);
      expect(errorId.startsWith(definition.category === 'input' ? 'FX-I' : 'FX-P')).toBe(true);
      expect(definition.description.length).toBeLessThanOrEqual(50);
    }
  });

  it('documents every error with a cause and resolution', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.cause).toBeTruthy();
      expect(definition.resolution).toBeTruthy();
    }
  });

  it('looks up definitions by id', () => {
    expect(ERROR_REGISTRY.has('FX-P005')).toBe(true);
    expect(ERROR_REGISTRY.get('FX-P005')?.category).toBe('parse');
    expect(ERROR_REGISTRY.get('FX-X999')).toBeUndefined();
  });
});

describe('Errors: renderMessage', () => {
  it('replaces placeholders with context values', () => {
    expect(renderMessage('Unmatched {close} here', { close: ']' })).toBe(
      'Unmatched ] here'
    );
  });

  it('renders missing values as empty strings', () => {
    expect(renderMessage('a{missing}b', {})).toBe('ab');
  });

  it('leaves a template with an unclosed brace unchanged', () => {
    expect(renderMessage('open {brace', { brace: 'x' })).toBe('open {brace');
  });

  it('stringifies non-string values', () => {
    expect(renderMessage('{count} left', { count: 2 })).toBe('2 left');
  });
});

describe('Errors: createError', () => {
  it('creates parsing errors with a location suffix', () => {
    const err = createError('FX-P008', { close: ')' }, { line: 3, column: 12 });
    expect(err).toBeInstanceOf(ParsingError);
    expect(err).toBeInstanceOf(FxError);
    expect(err.name).toBe('ParsingError');
    expect(err.message).toBe('Unmatched ) in extraction field at 3:12');
  });

  it('creates early end errors without a location', () => {
    const err = createError('FX-I003', { literal: 'string' }, { line: 1, column: 1 });
    expect(err).toBeInstanceOf(EarlyEndError);
    expect(err.location).toBeUndefined();
    expect(err.message).toBe('Input ends inside a string literal');
  });

  it('throws TypeError for unknown ids', () => {
    expect(() => createError('FX-X999', {})).toThrow(TypeError);
    expect(() => createError('FX-X999', {})).toThrow('Unknown error ID: FX-X999');
  });

  it('checks the category of specialized errors', () => {
    expect(() => new EarlyEndError('FX-P005', 'msg')).toThrow(
      'Expected input error ID, got: FX-P005'
    );
    expect(
      () => new ParsingError('FX-I001', 'msg', { line: 1, column: 1 })
    ).toThrow('Expected parse error ID, got: FX-I001');
  });
});

describe('Errors: FxError data', () => {
  it('strips the location suffix in toData', () => {
    const err = createError('FX-P005', {}, { line: 2, column: 4 });
    expect(err.toData()).toEqual({
      errorId: 'FX-P005',
      message: 'All right braces have to be doubled in f/x literals',
      location: { line: 2, column: 4 },
      context: {},
    });
  });

  it('formats with a custom formatter', () => {
    const err = createError('FX-P011', { count: 2 }, { line: 1, column: 9 });
    expect(err.format((data) => `${data.errorId}: ${data.message}`)).toBe(
      'FX-P011: Extraction field ends with 2 unmatched ?'
    );
    expect(err.format()).toBe(
      'Extraction field ends with 2 unmatched ? at 1:9'
    );
  });
});
