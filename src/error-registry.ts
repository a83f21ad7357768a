/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining the error ID prefix */
export type ErrorCategory = 'lexer' | 'parse';

/** Every front-end diagnostic stops lexing or parsing, so all are errors */
export type ErrorSeverity = 'error';

/** Snippet of source that triggers the error */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Everything known about one diagnostic code */
export interface ErrorDefinition {
  /** Format: {lex|parse}::{snake_case_name} (e.g., lex::invalid_int) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly description: string;
  /** `{name}` placeholders are filled from the error context */
  readonly messageTemplate: string;
  /** Label attached to the primary span */
  readonly label: string;
  /** How to resolve this error */
  readonly help?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/** Read-only lookup of definitions by error id */
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
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
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
  // Lexer Errors (lex::*)
  {
    errorId: 'lex::invalid_int',
    category: 'lexer',
    description: 'Integer literal out of range',
    messageTemplate: "invalid integer literal '{lexeme}'",
    label: 'this integer does not fit in 64 bits',
    help: 'ensure the integer is within valid range (0 to 18446744073709551615)',
    examples: [{ description: 'Literal above 2^64 - 1', code: '18446744073709551616' }],
  },
  {
    errorId: 'lex::invalid_float',
    category: 'lexer',
    description: 'Malformed real literal',
    messageTemplate: "invalid float literal '{lexeme}'",
    label: 'not a valid real number',
    help: 'check the float format (e.g., 1.0, 1e10, .5)',
    examples: [{ description: 'Exponent without digits', code: '1e' }],
  },
  {
    errorId: 'lex::empty_char',
    category: 'lexer',
    description: 'Empty character literal',
    messageTemplate: 'character literal cannot be empty',
    label: 'empty character literal',
    help: "character literals must contain exactly one character, e.g., 'a'",
    examples: [{ description: 'Two adjacent quotes', code: "''" }],
  },
  {
    errorId: 'lex::multi_char',
    category: 'lexer',
    description: 'Character literal with several characters',
    messageTemplate: 'character literal must contain exactly one character',
    label: 'more than one character',
    help: 'keep only one character between the quotes',
    examples: [{ description: 'Two characters', code: "'ab'" }],
  },
  {
    errorId: 'lex::unknown_escape',
    category: 'lexer',
    description: 'Unknown escape sequence',
    messageTemplate: 'unknown escape sequence \\{char} in character literal',
    label: 'unknown escape',
    help: "valid escape sequences are: \\', \\\", \\\\, \\n, \\r, \\t, \\0",
    examples: [{ description: 'Unsupported escape', code: "'\\q'" }],
  },
  {
    errorId: 'lex::unterminated_char',
    category: 'lexer',
    description: 'Unterminated character literal',
    messageTemplate: 'unterminated character literal',
    label: 'missing closing quote',
    help: "close the literal with a single quote, e.g., 'a'",
    examples: [{ description: 'End of input inside the literal', code: "'a" }],
  },
  {
    errorId: 'lex::invalid_number_char',
    category: 'lexer',
    description: 'Number followed by identifier characters',
    messageTemplate: "invalid character in number literal '{lexeme}'",
    label: 'number literal runs into an identifier',
    help: 'separate the number from the following name with whitespace or an operator',
    examples: [{ description: 'Letters after digits', code: '12ab' }],
  },
  {
    errorId: 'lex::invalid_token',
    category: 'lexer',
    description: 'Unrecognized character',
    messageTemplate: "invalid token '{lexeme}'",
    label: 'not recognized',
    help: 'this character or sequence is not recognized',
    examples: [
      { description: 'Single pipe', code: 'a | b' },
      { description: 'Dot without digits', code: 'x.y' },
    ],
  },

  // Parse Errors (parse::*)
  {
    errorId: 'parse::unexpected_token',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'expected {expected}, found {found}',
    label: 'here',
    examples: [{ description: 'Missing then', code: 'if a else b' }],
  },
  {
    errorId: 'parse::unexpected_eof',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'unexpected end of input',
    label: 'expression expected here',
    help: 'the input ends where an expression is required',
    examples: [{ description: 'Dangling operator', code: '1 -' }],
  },
  {
    errorId: 'parse::expected_type',
    category: 'parse',
    description: 'Expected a type',
    messageTemplate: 'expected a type, found {found}',
    label: 'not a type',
    help: 'types are int, bool, char, real, unit or ()',
    examples: [{ description: 'Value in type position', code: 'val x : 1 = 1' }],
  },
  {
    errorId: 'parse::expected_primary',
    category: 'parse',
    description: 'Expected an expression',
    messageTemplate: 'expected an expression, found {found}',
    label: 'expression expected',
    help: 'an expression starts with a literal, a name, (, let, if, ~, not or &',
    examples: [{ description: 'Operator with no left operand', code: '* 2' }],
  },
  {
    errorId: 'parse::expected_delimiter',
    category: 'parse',
    description: 'Unclosed delimiter',
    messageTemplate: "expected '{expected}' to close '{opened}'",
    label: "expected '{expected}'",
    help: "add '{expected}' to match the opening '{opened}'",
    examples: [
      { description: 'Unclosed parenthesis', code: '(1' },
      { description: 'let without end', code: 'let in 1' },
    ],
  },
  {
    errorId: 'parse::expected_literal',
    category: 'parse',
    description: 'Expected a literal',
    messageTemplate: 'expected a literal, found {found}',
    label: 'literal expected',
    help: 'only literal values are allowed here',
  },
  {
    errorId: 'parse::nesting_too_deep',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'nesting exceeds {limit} levels',
    label: 'nesting limit reached here',
    help: 'bind inner parts to names with val',
    examples: [{ description: 'Deep parentheses', code: '(((( ... 1 ... ))))' }],
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Fill `{name}` placeholders from `context`.
 *
 * Absent keys become empty strings and other values go through String().
 * A template with an unclosed brace comes back as it was.
 *
 * @example
 * renderMessage("expected {expected}, found {found}", { expected: "')'", found: "end of input" })
 * // Returns: "expected ')', found end of input"
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

      // No closing brace
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
