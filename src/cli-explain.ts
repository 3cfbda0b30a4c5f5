/**
 * CLI Error Explanation
 * Function for rendering full error documentation
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from './error-registry.js';

/**
 * Render full error documentation for --explain command.
 *
 * @param errorId - Error identifier (format: FX-{I|P}{3-digit})
 * @returns Formatted documentation string, or null if errorId is invalid/unknown
 *
 * @example
 * explainError("FX-P005")
 * // Returns: formatted documentation with cause, resolution, examples
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];

  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push('');

  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push('');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}

/** One line per registered error: id and description */
export function listErrors(): string {
  const lines: string[] = [];
  for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
    lines.push(`${errorId}  ${definition.description}`);
  }
  return lines.join('\n');
}
