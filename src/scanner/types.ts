/**
 * Scanner Types
 * Shapes exchanged between the literal, field and output stages
 */

import type { SourceLocation } from '../source-location.js';
import type { LiteralPrefix } from './helpers.js';

/** How the body of the literal being scanned ends */
export interface LiteralBody {
  readonly isRaw: boolean;
  readonly quote: string;
  /** Raw delimiter; empty for non-raw literals */
  readonly delimiter: string;
  /** Closing sequence: the quote, or )delimiter" for raw literals */
  readonly terminator: string;
}

/** One {expression[:spec]} span of an extraction literal */
export interface ExtractionField {
  /** Location of the expression's first character */
  readonly start: SourceLocation;
  /** Argument text as passed to the formatting call */
  readonly expression: string;
  /** Debug label emitted before the placeholder, already encoded for the literal */
  readonly label: string | null;
  /** Fields found in the format spec, in order */
  readonly nested: readonly ExtractionField[];
}

export interface ScannedLiteral {
  readonly prefix: LiteralPrefix;
  readonly body: LiteralBody;
  /** Literal text from the R or opening quote through the closing quote */
  readonly text: string;
  readonly fields: readonly ExtractionField[];
  /** Where the re-emitted literal starts so its quote keeps its column */
  readonly start: SourceLocation;
  /** Location of the character after the closing quote */
  readonly end: SourceLocation;
}
