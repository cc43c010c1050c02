/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Sub-kinds of runtime failure */
export type RuntimeErrorKind =
  | 'TypeMismatch'
  | 'DivisionByZero'
  | 'UndefinedVariable'
  | 'StackOverflow';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LOX-{category}{3-digit} (e.g., LOX-R001) */
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
  /** Runtime sub-kind; present on every runtime definition */
  readonly runtimeKind?: RuntimeErrorKind | undefined;
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
  // Lexer Errors (LOX-L0xx)
  {
    errorId: 'LOX-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string',
    cause: 'String opened with a double quote but never closed before end of input.',
    resolution: 'Add the closing double quote.',
  },
  {
    errorId: 'LOX-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: "Unexpected character '{char}'",
    cause: 'Character is not part of the language syntax.',
    resolution: 'Remove the character or move it inside a string literal.',
  },

  // Parse Errors (LOX-P0xx)
  {
    errorId: 'LOX-P001',
    category: 'parse',
    description: 'Missing expected token',
    messageTemplate: 'Expect {expectation}',
    cause: 'A required token such as ; ) or } is missing.',
    resolution: 'Insert the expected token at the reported position.',
  },
  {
    errorId: 'LOX-P002',
    category: 'parse',
    description: 'Expected expression',
    messageTemplate: 'Expect expression',
    cause: 'A token that cannot start an expression appeared where one was required.',
    resolution: 'Provide a literal, variable, or parenthesized expression.',
  },
  {
    errorId: 'LOX-P003',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Invalid assignment target',
    cause: 'The left side of = is not a plain variable name.',
    resolution: 'Assign to a variable: name = value.',
  },
  {
    errorId: 'LOX-P004',
    category: 'parse',
    description: 'Invalid loop body',
    messageTemplate:
      'Loop body must be a block, print statement, or expression statement',
    cause: 'A while or for loop body starts with var, if, while, or for.',
    resolution: 'Wrap the body in braces: while (cond) { ... }',
  },
  {
    errorId: 'LOX-P005',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'Maximum nesting depth exceeded',
    cause: 'Expressions or blocks are nested deeper than the parser can follow.',
    resolution: 'Split the construct into separate statements.',
  },

  // Runtime Errors (LOX-R0xx)
  {
    errorId: 'LOX-R001',
    category: 'runtime',
    description: 'Operand type mismatch',
    messageTemplate: "Operator '{operator}' expects {expected}, got {actual}",
    cause: 'An operator was applied to values of unsupported kinds.',
    resolution:
      'Use numbers for arithmetic and comparison; + also accepts two strings.',
    runtimeKind: 'TypeMismatch',
  },
  {
    errorId: 'LOX-R002',
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: 'Division by zero',
    cause: 'The right operand of / evaluated to 0.',
    resolution: 'Check the divisor before dividing.',
    runtimeKind: 'DivisionByZero',
  },
  {
    errorId: 'LOX-R003',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: "Undefined variable '{name}'",
    cause: 'Variable read or assigned without a declaration in any enclosing scope.',
    resolution: 'Declare the variable with var before using it.',
    runtimeKind: 'UndefinedVariable',
  },
  {
    errorId: 'LOX-R004',
    category: 'runtime',
    description: 'Nesting too deep to evaluate',
    messageTemplate: 'Maximum nesting depth exceeded',
    cause: 'Evaluation of a deeply nested construct exhausted the call stack.',
    resolution: 'Split the construct into separate statements.',
    runtimeKind: 'StackOverflow',
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
 * renderMessage("Undefined variable '{name}'", { name: 'x' })
 * // Returns: "Undefined variable 'x'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
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
