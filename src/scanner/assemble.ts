/**
 * Output Assembly
 * Turns a scanned literal into its replacement text
 */

import type { SourceLocation } from '../source-location.js';
import type { ScanContext } from './context.js';
import type { ExtractionField, ScannedLiteral } from './types.js';

/** Fields in argument order: each field followed by its nested fields */
export function flattenFields(
  fields: readonly ExtractionField[]
): ExtractionField[] {
  return fields.flatMap((field) => [field, ...field.nested]);
}

/** A trailing `*` in the function name becomes the argument count */
export function resolveCallee(functionName: string, argumentCount: number): string {
  return functionName.endsWith('*')
    ? `${functionName.slice(0, -1)}${argumentCount}`
    : functionName;
}

/**
 * A #line directive on its own line, followed by padding that puts the
 * next character at the given column.
 */
export function locationMarker(
  location: SourceLocation,
  sourcePath: string
): string {
  const path = sourcePath.replace(/[\\"]/g, '\\$&');
  return `\n#line ${location.line} "${path}"\n${' '.repeat(location.column - 1)}`;
}

export function assembleLiteral(
  context: ScanContext,
  literal: ScannedLiteral
): string {
  const { prefix, text, fields, start, end } = literal;
  const options = context.options;
  const plain = `${prefix.encoding}${text}`;
  if (prefix.kind === null) {
    return plain;
  }

  const withMarkers = options.emitLocationMarkers && !context.inDirective;
  const mark = (location: SourceLocation): string =>
    withMarkers ? locationMarker(location, options.sourcePath) : '';

  const args = flattenFields(fields);
  let output = mark(start) + plain;
  for (const arg of args) {
    output += withMarkers ? `,${mark(arg.start)}` : ', ';
    output += arg.expression;
  }

  let callee: string | null = null;
  if (prefix.kind === 'f') {
    callee = resolveCallee(options.functionName, args.length);
    output = `${callee}(${output})`;
  }
  output += mark(end);

  options.observability.onLiteral?.({
    kind: prefix.kind,
    location: start,
    argumentCount: args.length,
    callee,
  });

  return output;
}
