/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SPY-{category}{3-digit} (e.g., SPY-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/** Error definitions keyed by ID. Immutable after initialization. */
export type ErrorRegistry = ReadonlyMap<string, ErrorDefinition>;

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (SPY-L0xx)
  {
    errorId: 'SPY-L001',
    category: 'lexer',
    description: 'Illegal character',
    messageTemplate: 'Unauthorized character {char} detected in the operation',
    resolution: 'Remove the character or place it inside a string literal.',
  },

  // Parse Errors (SPY-P0xx)
  {
    errorId: 'SPY-P001',
    category: 'parse',
    description: 'Expected token not found',
    messageTemplate: 'Expected {expected}, found {actual}',
    resolution:
      'Check for unclosed parentheses, braces or brackets and for missing keywords.',
  },

  // Runtime Errors (SPY-R0xx)
  {
    errorId: 'SPY-R001',
    category: 'runtime',
    description: 'Undefined name',
    messageTemplate: "'{name}' is not defined",
    resolution: 'Declare the name with assign or mission before using it.',
  },
  {
    errorId: 'SPY-R002',
    category: 'runtime',
    description: 'Type mismatch',
    messageTemplate: '{detail}',
  },
  {
    errorId: 'SPY-R003',
    category: 'runtime',
    description: 'Arity mismatch',
    messageTemplate:
      "Mission '{name}' expects {expected} argument(s), received {actual}",
  },
  {
    errorId: 'SPY-R004',
    category: 'runtime',
    description: 'Value is not callable',
    messageTemplate: '{type} value is not callable',
  },
  {
    errorId: 'SPY-R005',
    category: 'runtime',
    description: 'Value is not indexable',
    messageTemplate: '{type} value is not indexable',
  },
  {
    errorId: 'SPY-R006',
    category: 'runtime',
    description: 'Index out of range',
    messageTemplate: 'Index {index} out of range for length {length}',
  },
  {
    errorId: 'SPY-R007',
    category: 'runtime',
    description: 'Division or modulo by zero',
    messageTemplate: '{operation} by zero',
  },
  {
    errorId: 'SPY-R008',
    category: 'runtime',
    description: 'Withdraw from empty list',
    messageTemplate: 'Cannot withdraw from an empty list',
  },
  {
    errorId: 'SPY-R009',
    category: 'runtime',
    description: 'abort/proceed outside loop',
    messageTemplate: "'{keyword}' used outside of a loop",
    resolution: 'abort and proceed may only appear inside each or chase.',
  },
  {
    errorId: 'SPY-R010',
    category: 'runtime',
    description: 'Invalid integer input',
    messageTemplate: 'Invalid integer input: "{input}"',
  },
  {
    errorId: 'SPY-R011',
    category: 'runtime',
    description: 'Launch failed',
    messageTemplate: 'Failed to load script "{path}": {reason}',
  },
  {
    errorId: 'SPY-R012',
    category: 'runtime',
    description: 'Circular launch',
    messageTemplate: 'Circular launch detected: {chain}',
  },
  {
    errorId: 'SPY-R013',
    category: 'runtime',
    description: 'Call depth exceeded',
    messageTemplate: 'Maximum call depth of {limit} exceeded',
    resolution: 'Check for unbounded recursion or raise maxCallDepth.',
  },
  {
    errorId: 'SPY-R014',
    category: 'runtime',
    description: 'Integer result too large',
    messageTemplate: 'Result of {operation} is too large to represent',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new Map<string, ErrorDefinition>(
  ERROR_DEFINITIONS.map((def) => [def.errorId, def])
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
 * renderMessage("Expected {expected}, found {actual}", {expected: "')'", actual: "end of input"})
 * // Returns: "Expected ')', found end of input"
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
      while (j < template.length && template.charAt(j) !== '}') {
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
