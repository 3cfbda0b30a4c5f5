/**
 * CLI Self Test
 * Runs the built-in corpus of extraction cases
 */

import * as fs from 'fs';
import { FxError } from './error-classes.js';
import { extract } from './extract.js';

/**
 * One corpus entry. Without `expected` or `error` the input must come
 * back unchanged.
 */
export interface SelfTestCase {
  readonly name?: string | undefined;
  readonly input: string;
  readonly expected?: string | undefined;
  /** Error id the input must fail with */
  readonly error?: string | undefined;
}

export interface SelfTestFailure {
  readonly index: number;
  readonly testCase: SelfTestCase;
  readonly reason: string;
}

export interface SelfTestReport {
  readonly total: number;
  readonly failures: SelfTestFailure[];
}

const CORPUS_URL = new URL('../fixtures/self-test.json', import.meta.url);

function optionalString(
  entry: Map<string, unknown>,
  key: string,
  index: number
): string | undefined {
  const value = entry.get(key);
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new Error(`Invalid self-test case ${index}: ${key} must be a string`);
}

/** Validate parsed corpus JSON */
export function parseCorpus(data: unknown): SelfTestCase[] {
  if (!Array.isArray(data)) {
    throw new Error('Invalid self-test corpus: must be an array');
  }

  return data.map((item: unknown, index): SelfTestCase => {
    if (typeof item !== 'object' || item === null) {
      throw new Error(`Invalid self-test case ${index}: must be an object`);
    }
    const entry = new Map<string, unknown>(Object.entries(item));
    const input = optionalString(entry, 'input', index);
    if (input === undefined) {
      throw new Error(`Invalid self-test case ${index}: input is required`);
    }
    return {
      name: optionalString(entry, 'name', index),
      input,
      expected: optionalString(entry, 'expected', index),
      error: optionalString(entry, 'error', index),
    };
  });
}

export function loadCorpus(): SelfTestCase[] {
  return parseCorpus(JSON.parse(fs.readFileSync(CORPUS_URL, 'utf-8')));
}

/** Check one case; returns the failure reason or null when it passes */
export function checkCase(testCase: SelfTestCase): string | null {
  let output: string;
  try {
    output = extract(testCase.input);
  } catch (err) {
    if (!(err instanceof FxError)) throw err;
    if (testCase.error === undefined) {
      return `unexpected ${err.errorId}: ${err.message}`;
    }
    if (err.errorId !== testCase.error) {
      return `expected ${testCase.error}, got ${err.errorId}: ${err.message}`;
    }
    return null;
  }

  if (testCase.error !== undefined) {
    return `expected ${testCase.error}, got output ${JSON.stringify(output)}`;
  }
  const expected = testCase.expected ?? testCase.input;
  if (output !== expected) {
    return `expected ${JSON.stringify(expected)}, got ${JSON.stringify(output)}`;
  }
  return null;
}

export function runSelfTest(
  cases: SelfTestCase[] = loadCorpus()
): SelfTestReport {
  const failures: SelfTestFailure[] = [];
  cases.forEach((testCase, index) => {
    const reason = checkCase(testCase);
    if (reason !== null) {
      failures.push({ index, testCase, reason });
    }
  });
  return { total: cases.length, failures };
}

/** Human-readable report: one line per failure and a summary line */
export function formatReport(report: SelfTestReport): string {
  const lines = report.failures.map(
    ({ index, testCase, reason }) =>
      `FAIL #${index}${testCase.name ? ` (${testCase.name})` : ''}: ${reason}`
  );
  const passed = report.total - report.failures.length;
  lines.push(`${passed}/${report.total} self tests passed`);
  return lines.join('\n');
}
