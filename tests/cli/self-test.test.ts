/**
 * CLI Tests: --test
 */

import { describe, expect, it } from 'vitest';
import {
  checkCase,
  formatReport,
  loadCorpus,
  parseCorpus,
  runSelfTest,
} from '../../src/cli-self-test.js';

describe('self test corpus', () => {
  it('passes every bundled case', () => {
    const report = runSelfTest();
    expect(formatReport(report)).toBe(
      `${report.total}/${report.total} self tests passed`
    );
    expect(report.total).toBe(loadCorpus().length);
  });
});

describe('parseCorpus', () => {
  it('requires an array', () => {
    expect(() => parseCorpus({})).toThrow(
      'Invalid self-test corpus: must be an array'
    );
  });

  it('requires object entries with an input', () => {
    expect(() => parseCorpus([1])).toThrow(
      'Invalid self-test case 0: must be an object'
    );
    expect(() => parseCorpus([{ input: 'a' }, { name: 'b' }])).toThrow(
      'Invalid self-test case 1: input is required'
    );
    expect(() => parseCorpus([{ input: 'a', expected: 2 }])).toThrow(
      'Invalid self-test case 0: expected must be a string'
    );
  });
});

describe('checkCase', () => {
  it('passes unchanged input', () => {
    expect(checkCase({ input: 'int a;' })).toBeNull();
  });

  it('compares rewritten output', () => {
    expect(checkCase({ input: 'f"{a}"', expected: 'std::format("{}", a)' })).toBeNull();
    expect(checkCase({ input: 'x"{a}"', expected: 'x' })).toBe(
      'expected "x", got "\\"{}\\", a"'
    );
  });

  it('matches error ids', () => {
    expect(checkCase({ input: 'f"}"', error: 'FX-P005' })).toBeNull();
    expect(checkCase({ input: 'f"}"', error: 'FX-P006' })).toBe(
      'expected FX-P006, got FX-P005: All right braces have to be doubled in f/x literals at 1:3'
    );
    expect(checkCase({ input: 'f"}"' })).toBe(
      'unexpected FX-P005: All right braces have to be doubled in f/x literals at 1:3'
    );
    expect(checkCase({ input: 'a', error: 'FX-I001' })).toBe(
      'expected FX-I001, got output "a"'
    );
  });
});

describe('formatReport', () => {
  it('lists failures before the summary', () => {
    const report = runSelfTest([
      { input: 'a' },
      { name: 'bad', input: 'b', expected: 'c' },
    ]);
    expect(formatReport(report)).toBe(
      'FAIL #1 (bad): expected "c", got "b"\n1/2 self tests passed'
    );
  });
});
