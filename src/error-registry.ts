/**
 * Error Registry
 * Central error definition registry with template rendering and help URL generation.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'cli';

/**
 * Example demonstrating an error condition.
 * Used by `tinyc-lex --explain`.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TINYC-{L|C}{3-digit} (e.g., TINYC-L001) */
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
 * Registry for all error definitions with O(1) lookup.
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
  // Lexer Errors (TINYC-L0xx)
  {
    errorId: 'TINYC-L001',
    category: 'lexer',
    description: 'Unknown character',
    messageTemplate: 'Encountered unknown character: {char}',
    cause:
      'Character is not punctuation, whitespace, a digit, a letter or an underscore, or it cannot continue the current identifier or integer.',
    resolution:
      'Remove the character. Only { } ( ) ; whitespace, identifiers and integer literals are recognized.',
    examples: [
      {
        description: 'Operator characters are not part of the language',
        code: 'Return 1 + 2;',
      },
      {
        description: 'Underscore inside an integer literal',
        code: 'Return 1_000;',
      },
    ],
  },
  {
    errorId: 'TINYC-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character: {char}',
    cause:
      'A letter or digit appeared inside an integer literal where it is not a valid digit for the literal radix or a radix prefix.',
    resolution:
      'Use digits valid for the radix: 0b for 0-1, 0o for 0-7, 0x for 0-9 and a-f, no prefix for 0-9. Separate identifiers from numbers with whitespace.',
    examples: [
      {
        description: 'Digit out of range for a binary literal',
        code: 'Return 0b102;',
      },
      {
        description: 'Identifier glued to a number',
        code: 'Int 1x;',
      },
      {
        description: 'Uppercase radix prefix',
        code: 'Return 0XFF;',
      },
    ],
  },
  {
    errorId: 'TINYC-L003',
    category: 'lexer',
    description: 'Integer literal out of range',
    messageTemplate: 'Integer literal out of range: {literal}',
    cause: 'Integer literal does not fit in an unsigned 64-bit value.',
    resolution: 'Use a value no larger than 18446744073709551615 (0xffffffffffffffff).',
    examples: [
      {
        description: 'One past the largest 64-bit value',
        code: 'Return 18446744073709551616;',
      },
    ],
  },

  // CLI Errors (TINYC-C0xx)
  {
    errorId: 'TINYC-C001',
    category: 'cli',
    description: 'Missing file argument',
    messageTemplate: 'Missing file argument',
    cause: 'tinyc-lex was invoked without a file to tokenize.',
    resolution: 'Pass a file path, or - to read the source from stdin.',
    examples: [
      {
        description: 'Tokenize a file',
        code: 'tinyc-lex main.tc',
      },
    ],
  },
  {
    errorId: 'TINYC-C002',
    category: 'cli',
    description: 'Unknown option',
    messageTemplate: 'Unknown option: {option}',
    cause: 'A flag that tinyc-lex does not recognize was passed.',
    resolution: 'Run tinyc-lex --help for the list of options.',
  },
  {
    errorId: 'TINYC-C003',
    category: 'cli',
    description: 'Invalid option value',
    messageTemplate: 'Invalid {option} value: {value}. Must be one of: {allowed}',
    cause: 'An option that takes a value was given a missing or unsupported one.',
    resolution: 'Pass one of the listed values after the option.',
    examples: [
      {
        description: 'Unsupported output format',
        code: 'tinyc-lex --format xml main.tc',
      },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Unexpected character: {char}", { char: "9" })
 * // Returns: "Unexpected character: 9"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      // Unclosed brace
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

/**
 * Documentation anchor for an error ID, relative to the package root.
 *
 * @returns Anchor such as "docs/errors.md#tinyc-l001", or empty string if
 *   errorId is malformed
 */
export function getHelpUrl(errorId: string): string {
  const errorIdPattern = /^TINYC-[LC]\d{3}$/;
  if (!errorIdPattern.test(errorId)) {
    return '';
  }

  return `docs/errors.md#${errorId.toLowerCase()}`;
}
