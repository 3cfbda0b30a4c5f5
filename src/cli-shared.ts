/**
 * CLI Shared Utilities
 * Common formatting and I/O helpers for the fxlit CLI
 */

import * as fs from 'fs';
import { EarlyEndError, ParsingError } from './error-classes.js';
import type { OutputSink } from './scanner/state.js';

/**
 * Format error for stderr output
 *
 * Malformed constructs name their line; premature ends of input print the
 * bare message.
 */
export function formatError(err: Error): string {
  if (err instanceof ParsingError) {
    const location = err.location;
    const baseMessage = err.message.replace(/ at \d+:\d+$/, '');
    if (location) {
      return `Line ${location.line}: ${baseMessage}`;
    }
    return baseMessage;
  }

  if (err instanceof EarlyEndError) {
    return err.message;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** True for errors raised while reading or writing files */
export function isFileError(err: Error): boolean {
  return 'code' in err && typeof err.code === 'string' && 'syscall' in err;
}

/**
 * Package version read from package.json
 *
 * @returns The version string, or '0.0.0' when package.json cannot be read
 */
export function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (err) {
    if (!(err instanceof Error) || !isFileError(err)) throw err;
  }
  return '0.0.0';
}

/** Sink writing each chunk to an open file descriptor */
export function createFdSink(fd: number): OutputSink {
  return {
    write(chunk: string): void {
      fs.writeSync(fd, chunk);
    },
  };
}
