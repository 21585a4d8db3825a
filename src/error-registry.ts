/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'eval' | 'cli';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: NINJA-{category letter}{3-digit} (e.g., NINJA-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
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
  // Lexer Errors (NINJA-L0xx)
  {
    errorId: 'NINJA-L001',
    category: 'lexer',
    description: 'Unterminated variable reference',
    messageTemplate: "unterminated '${' in {text}",
    cause: 'A ${ reference inside a path was never closed with }.',
    resolution: 'Close the reference with } or escape the dollar as $$.',
  },
  {
    errorId: 'NINJA-L002',
    category: 'lexer',
    description: 'Unexpected end of input',
    messageTemplate: 'unexpected eof after {escape}',
    cause: 'An escape character was the last character of the file.',
    resolution: 'Remove the trailing escape character or complete the line.',
  },
  {
    errorId: 'NINJA-L003',
    category: 'lexer',
    description: 'Line too long',
    messageTemplate: 'line exceeds {maxLength} characters',
    cause: 'A value is longer than the configured maximum length.',
    resolution: 'Split the value or raise the maximum value length.',
  },

  // Parse Errors (NINJA-P0xx)
  {
    errorId: 'NINJA-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'expected {expected}, got {actual}',
    cause: 'Token appears in a position the grammar does not allow.',
    resolution: 'Check the statement syntax at the indicated position.',
  },
  {
    errorId: 'NINJA-P002',
    category: 'parse',
    description: 'Unexpected token at top level',
    messageTemplate: 'unexpected {token}',
    cause: 'A top-level statement must start with a keyword or a name.',
    resolution: 'Start the line with rule, build, pool, default, include, subninja or a variable name.',
  },
  {
    errorId: 'NINJA-P003',
    category: 'parse',
    description: 'Unexpected indent',
    messageTemplate: 'unexpected indent',
    cause: 'An indented line does not belong to a rule, build or pool block.',
    resolution: 'Remove the indentation or align it with the enclosing block.',
  },
  {
    errorId: 'NINJA-P004',
    category: 'parse',
    description: 'Invalid $-escape',
    messageTemplate: 'bad $-escape (literal $ must be written as $$)',
    cause: 'A $ is followed by a character that starts no escape or reference.',
    resolution: 'Use $$, $ , $:, $name or ${name}.',
  },
  {
    errorId: 'NINJA-P005',
    category: 'parse',
    description: 'Duplicate rule',
    messageTemplate: "duplicate rule '{name}'",
    cause: 'Rules cannot be redefined within the same manifest.',
    resolution: 'Rename one of the rules.',
  },
  {
    errorId: 'NINJA-P006',
    category: 'parse',
    description: 'Rule without command',
    messageTemplate: "expected 'command =' line",
    cause: 'Every rule needs a command binding.',
    resolution: 'Add a command = ... line to the rule block.',
  },
  {
    errorId: 'NINJA-P007',
    category: 'parse',
    description: 'Unknown build rule',
    messageTemplate: "unknown build rule '{name}'",
    cause: 'A build statement refers to a rule that was not declared before it.',
    resolution: 'Declare the rule before the first build statement using it.',
  },
  {
    errorId: 'NINJA-P008',
    category: 'parse',
    description: 'Included file unreadable',
    messageTemplate: "loading '{path}': {reason}",
    cause: 'The file named by include or subninja could not be read.',
    resolution: 'Check the path; it is resolved against the build root.',
  },
  {
    errorId: 'NINJA-P009',
    category: 'parse',
    description: 'Error in included file',
    messageTemplate: "in '{path}': {reason}",
    cause: 'Parsing the included file failed.',
    resolution: 'Fix the error reported for the included file.',
  },
  {
    errorId: 'NINJA-P010',
    category: 'parse',
    description: 'Duplicate pool',
    messageTemplate: "duplicate pool '{name}'",
    cause: 'Pools cannot be redefined within the same manifest.',
    resolution: 'Rename one of the pools.',
  },
  {
    errorId: 'NINJA-P011',
    category: 'parse',
    description: 'Empty include path',
    messageTemplate: 'expected path to manifest file',
    cause: 'The include or subninja path expanded to an empty string.',
    resolution: 'Give the path, or check the variables it refers to.',
  },
  {
    errorId: 'NINJA-P012',
    category: 'parse',
    description: 'Include cycle',
    messageTemplate: 'include cycle: {cycle}',
    cause: 'A file includes itself, directly or through other files.',
    resolution: 'Break the cycle by removing one of the include lines.',
  },
  {
    errorId: 'NINJA-P013',
    category: 'parse',
    description: 'Include depth exceeded',
    messageTemplate: 'include depth exceeds {maxDepth}',
    cause: 'Includes are nested deeper than the configured limit.',
    resolution: 'Flatten the include hierarchy or raise maxIncludeDepth.',
  },

  // Evaluation Errors (NINJA-E0xx)
  {
    errorId: 'NINJA-E001',
    category: 'eval',
    description: 'Cycle in variable expansion',
    messageTemplate: 'cycle in variable expansion: {cycle}',
    cause: 'Variables refer to each other so that expansion never ends.',
    resolution: 'Remove one of the references in the cycle.',
  },

  // CLI Errors (NINJA-C0xx)
  {
    errorId: 'NINJA-C001',
    category: 'cli',
    description: 'File not found',
    messageTemplate: 'File not found: {path}',
    cause: 'The manifest or depfile given on the command line does not exist.',
    resolution: 'Check the path and the working directory.',
  },
  {
    errorId: 'NINJA-C002',
    category: 'cli',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'The configuration file is not valid JSON or has bad values.',
    resolution: 'Fix the configuration file or remove it.',
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
 * Placeholder format: {varName}. A `{` directly preceded by `$` is copied
 * verbatim so that templates can mention `${`.
 * Missing context values render as empty string.
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("duplicate rule '{name}'", { name: "cc" })
 * // Returns: "duplicate rule 'cc'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{' && template[i - 1] !== '$') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const placeholderName = template.slice(i + 1, j);
      const value = context[placeholderName];
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
