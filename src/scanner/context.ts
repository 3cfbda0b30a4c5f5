/**
 * Scan Context
 * Shared by every recursive scan of one input
 */

import type { ResolvedExtractOptions } from '../options.js';
import type { Cursor } from './state.js';

export interface ScanContext {
  readonly cursor: Cursor;
  readonly options: ResolvedExtractOptions;
  /** Set while scanning a #define line and its continuations */
  inDirective: boolean;
}

export function createScanContext(
  cursor: Cursor,
  options: ResolvedExtractOptions
): ScanContext {
  return { cursor, options, inDirective: false };
}
