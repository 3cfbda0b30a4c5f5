/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining error ID prefix.
 * - input: the input ended before a multi-line construct closed (FX-I)
 * - parse: a construct is malformed (FX-P)
 */
export type ErrorCategory = 'input' | 'parse';

/**
 * Example demonstrating an error condition.
 * Used by `fxlit --explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: FX-{I|P}{3-digit} (e.g., FX-P005) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Premature end of input (FX-I0xx)
  {
    errorId: 'FX-I001',
    category: 'input',
    description: 'Unterminated block comment',
    messageTemplate: 'Input ends inside a /* comment',
    cause: 'A /* comment was opened but the input ended before its */.',
    resolution: 'Close the comment with */.',
    examples: [{ description: 'Comment never closed', code: 'x = 1; /* note' }],
  },
  {
    errorId: 'FX-I002',
    category: 'input',
    description: 'Input ends after a line continuation',
    messageTemplate: 'Input ends with a \\ last on a line inside {construct}',
    cause:
      'The last line of the input ends in a backslash, so the construct it belongs to continues past the end of the input.',
    resolution:
      'Remove the trailing backslash or add the line it was meant to join.',
    examples: [
      { description: 'Continued directive on the last line', code: '#define X 1 \\' },
      { description: 'Continued // comment on the last line', code: 'x; // note \\' },
    ],
  },
  {
    errorId: 'FX-I003',
    category: 'input',
    description: 'Unterminated literal',
    messageTemplate: 'Input ends inside a {literal} literal',
    cause: 'A string or character literal was opened on the last line and never closed.',
    resolution: 'Add the closing quote.',
    examples: [{ description: 'Missing closing quote', code: 'auto s = "abc' }],
  },
  {
    errorId: 'FX-I004',
    category: 'input',
    description: 'Unterminated raw literal',
    messageTemplate: 'Input ends inside a raw literal with delimiter "{delimiter}"',
    cause:
      'No )delimiter" sequence matching the opening R"delimiter( was found before the end of the input.',
    resolution:
      'Close the raw literal with ) followed by the exact delimiter and a quote.',
    examples: [
      { description: 'Delimiter mismatch', code: 'R"ab(text)ba"' },
      { description: 'Closing sequence missing', code: 'R"(text' },
    ],
  },
  {
    errorId: 'FX-I005',
    category: 'input',
    description: 'Unterminated extraction field',
    messageTemplate: 'Input ends inside an extraction field',
    cause: 'An extraction field opened with { was still open when the input ended.',
    resolution: 'Close the field with } and check bracket and ? : balance.',
    examples: [{ description: 'Raw literal field never closed', code: 'fR"(value: {a' }],
  },
  {
    errorId: 'FX-I006',
    category: 'input',
    description: 'Unterminated format specification',
    messageTemplate: 'Input ends inside a format specification',
    cause: 'The format specification after a field colon was still open when the input ended.',
    resolution: 'Close the field with }.',
    examples: [{ description: 'Spec never closed', code: 'fR"(value: {a:>8' }],
  },
  {
    errorId: 'FX-I007',
    category: 'input',
    description: 'Input ends in raw literal delimiter',
    messageTemplate: 'Input ends inside a raw literal delimiter',
    cause: 'The input ended between R" and the ( that ends the delimiter.',
    resolution: 'Add the ( after the delimiter.',
    examples: [{ description: 'Delimiter without (', code: 'R"abc' }],
  },

  // Malformed constructs (FX-P0xx)
  {
    errorId: 'FX-P001',
    category: 'parse',
    description: 'Line ends inside a literal',
    messageTemplate: 'Line ends inside a {literal} literal',
    cause: 'A non-raw literal reached the end of its line without a closing quote.',
    resolution:
      'Close the literal on the same line, end the line with \\ to continue it, or use a raw literal.',
    examples: [{ description: 'Literal split over two lines', code: 'auto s = "abc\ndef";' }],
  },
  {
    errorId: 'FX-P002',
    category: 'parse',
    description: 'Raw literal delimiter not closed',
    messageTemplate: 'No ( before end of line after R"',
    cause: 'The delimiter of a raw literal must be followed by ( on the same line.',
    resolution: 'Add the ( directly after the delimiter.',
    examples: [{ description: 'Delimiter continues on the next line', code: 'R"abc\n(text)abc"' }],
  },
  {
    errorId: 'FX-P003',
    category: 'parse',
    description: 'Invalid raw literal delimiter',
    messageTemplate: 'Invalid character {char} in raw literal delimiter',
    cause: 'Raw literal delimiters may not contain ), \\ or whitespace.',
    resolution: 'Choose a delimiter made of other characters.',
    examples: [{ description: 'Space in delimiter', code: 'R"a b(text)a b"' }],
  },
  {
    errorId: 'FX-P004',
    category: 'parse',
    description: 'Raw literal delimiter too long',
    messageTemplate: 'Raw literal delimiter "{delimiter}" is longer than 16 characters',
    cause: 'Raw literal delimiters are limited to 16 characters.',
    resolution: 'Use a shorter delimiter.',
  },
  {
    errorId: 'FX-P005',
    category: 'parse',
    description: 'Unmatched right brace',
    messageTemplate: 'All right braces have to be doubled in f/x literals',
    cause: 'A } that does not close an extraction field was not followed by a second }.',
    resolution: 'Write }} for a literal right brace.',
    examples: [{ description: 'Single right brace', code: 'f"set {{} {a}"' }],
  },
  {
    errorId: 'FX-P006',
    category: 'parse',
    description: 'Line ends inside extraction field',
    messageTemplate: 'End of line inside an extraction field',
    cause:
      'An extraction field of a non-raw literal reached the end of its line before its closing }.',
    resolution:
      'Close the field on the same line, end the line with \\, or use a raw f/x literal.',
    examples: [{ description: 'Field split over two lines', code: 'f"sum: {a +\nb}"' }],
  },
  {
    errorId: 'FX-P007',
    category: 'parse',
    description: 'Mismatched brackets in field',
    messageTemplate: 'Mismatched brackets in extraction field: {open} closed by {close}',
    cause: 'A closing bracket does not match the most recently opened bracket.',
    resolution: 'Balance (), [] and {} inside the field expression.',
    examples: [{ description: 'Parenthesis closed by bracket', code: 'f"{g(a]}"' }],
  },
  {
    errorId: 'FX-P008',
    category: 'parse',
    description: 'Unmatched closing bracket in field',
    messageTemplate: 'Unmatched {close} in extraction field',
    cause: 'A ) or ] appears at the top level of a field without an opening bracket.',
    resolution: 'Remove the bracket or add its opening counterpart.',
    examples: [{ description: 'Stray parenthesis', code: 'f"{a)}"' }],
  },
  {
    errorId: 'FX-P009',
    category: 'parse',
    description: 'Format specification in nested field',
    messageTemplate: 'A nested extraction field may not itself end in a format specification',
    cause: 'A field inside a format specification contains a top-level colon.',
    resolution: 'Move the nested formatting into the expression, or drop the colon.',
    examples: [{ description: 'Colon in nested field', code: 'f"{a:x{b:x}d}"' }],
  },
  {
    errorId: 'FX-P010',
    category: 'parse',
    description: 'Literal ends inside format specification',
    messageTemplate: 'Literal ends inside a format specification',
    cause: 'The closing quote of the literal was found before the } that ends the field.',
    resolution: 'Close the field with } before the end of the literal.',
    examples: [{ description: 'Missing }', code: 'f"{a: >4"' }],
  },
  {
    errorId: 'FX-P011',
    category: 'parse',
    description: 'Unbalanced ? in field',
    messageTemplate: 'Extraction field ends with {count} unmatched ?',
    cause: 'A field ended with } while a conditional operator was still waiting for its :.',
    resolution: 'Complete the conditional expression or put it in parentheses.',
    examples: [{ description: 'Missing else branch', code: 'f"{a ? b}"' }],
  },
  {
    errorId: 'FX-P012',
    category: 'parse',
    description: 'Line ends inside format specification',
    messageTemplate: 'End of line inside a format specification',
    cause: 'A format specification in a non-raw literal reached the end of its line.',
    resolution: 'Close the field on the same line.',
  },
  {
    errorId: 'FX-P013',
    category: 'parse',
    description: 'Debug label breaks the enclosing literal',
    messageTemplate: 'Debug label cannot be written into the enclosing literal',
    cause:
      'The text of a {expr=} field holds a line break inside a non-raw literal, or the raw delimiter of the enclosing raw literal.',
    resolution: 'Drop the = and write the label by hand, or change the raw delimiter.',
    examples: [{ description: 'Label closing a raw literal', code: 'fR"x({g(")x")=})x"' }],
  },
  {
    errorId: 'FX-P014',
    category: 'parse',
    description: 'Empty extraction field',
    messageTemplate: 'Extraction field has no expression',
    cause: 'A field {} or {=} contains no expression to pass to the formatting call.',
    resolution: 'Write {{}} for literal braces, or put an expression in the field.',
    examples: [{ description: 'Empty placeholder', code: 'f"value: {}"' }],
  },
  {
    errorId: 'FX-P015',
    category: 'parse',
    description: 'Suffix after extraction literal',
    messageTemplate: 'An f/x literal cannot have a user-defined literal suffix',
    cause:
      'An identifier follows the closing quote of an f or x literal. After rewriting it would join the last argument.',
    resolution: 'Remove the suffix, or wrap the rewritten literal in a call that converts it.',
    examples: [{ description: 'String view suffix', code: 'x"{a}"sv' }],
  },
];

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

/** Error ids look like FX-I001 or FX-P015 */
export const ERROR_ID_PATTERN = /^FX-[IP]\d{3}$/;

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing {placeholder} tokens with context values.
 *
 * Missing context values render as empty strings. Unclosed braces leave the
 * template unchanged.
 *
 * @example
 * renderMessage("Unmatched {close} in extraction field", { close: ")" })
 * // Returns: "Unmatched ) in extraction field"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{' && template[i + 1] !== '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
