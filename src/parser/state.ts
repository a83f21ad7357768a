/**
 * Parser State
 * Core state management and token navigation utilities
 */

import { ParseError } from '../error-classes.js';
import {
  describeToken,
  describeTokenType,
  type SpannedToken,
  TOKEN_TYPES,
  type TokenType,
} from '../token-types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  /** Lexer output; always ends with EOF */
  readonly tokens: readonly SpannedToken[];
  /** Cursor, kept within [0, tokens.length) */
  pos: number;
  /** Current nesting of recursive constructs, bounded by MAX_NESTING_DEPTH */
  depth: number;
}

/** Deepest nesting of expressions, statements or parameters accepted */
export const MAX_NESTING_DEPTH = 500;

/**
 * @throws {TypeError} when the token list is empty or does not end with EOF
 */
export function createParserState(tokens: readonly SpannedToken[]): ParserState {
  const last = tokens[tokens.length - 1];
  if (!last || last.value.type !== TOKEN_TYPES.EOF) {
    throw new TypeError('Token stream must end with EOF');
  }
  return { tokens, pos: 0, depth: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function peek(state: ParserState, offset = 0): SpannedToken {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function current(state: ParserState): SpannedToken {
  return peek(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).value.type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).value.type);
}

/**
 * Return the current token and move past it. At EOF the cursor stays put,
 * so repeated calls keep returning EOF.
 * @internal
 */
export function advance(state: ParserState): SpannedToken {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Run `parse` one nesting level deeper. Past MAX_NESTING_DEPTH the parse
 * fails with NestingTooDeep at the current token instead of exhausting
 * the call stack.
 * @internal
 */
export function withNesting<T>(state: ParserState, parse: () => T): T {
  if (state.depth >= MAX_NESTING_DEPTH) {
    throw new ParseError({
      kind: 'NestingTooDeep',
      limit: MAX_NESTING_DEPTH,
      span: current(state).span,
    });
  }
  state.depth++;
  try {
    return parse();
  } finally {
    state.depth--;
  }
}

/** @internal */
export function expect(state: ParserState, type: TokenType): SpannedToken {
  if (check(state, type)) return advance(state);
  throw unexpectedToken(state, describeTokenType(type), generateHint(type, current(state)));
}

/**
 * Build an UnexpectedToken error at the current token.
 * @internal
 */
export function unexpectedToken(
  state: ParserState,
  expected: string,
  hint?: string | undefined
): ParseError {
  const token = current(state);
  return new ParseError({
    kind: 'UnexpectedToken',
    expected,
    found: describeToken(token.value),
    span: token.span,
    hint,
  });
}

// ============================================================
// ERROR HINTS
// ============================================================

const KEYWORD_TYPOS: Record<string, string> = {
  than: 'then',
  thn: 'then',
  els: 'else',
  esle: 'else',
  edn: 'end',
  ned: 'end',
  whiel: 'while',
  fn: 'fun',
  func: 'fun',
  var: 'val',
  ture: 'true',
  flase: 'false',
};

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(
  expectedType: TokenType,
  actual: SpannedToken
): string | undefined {
  const token = actual.value;

  if (token.type === TOKEN_TYPES.IDENTIFIER) {
    const suggestion = Object.hasOwn(KEYWORD_TYPOS, token.value.text)
      ? KEYWORD_TYPOS[token.value.text]
      : undefined;
    if (suggestion) {
      return `did you mean '${suggestion}'?`;
    }
  }

  if (expectedType === TOKEN_TYPES.EQ && token.type === TOKEN_TYPES.COLON_EQ) {
    return "use '=' to bind a name; ':=' assigns to an existing one";
  }

  if (expectedType === TOKEN_TYPES.COLON_EQ && token.type === TOKEN_TYPES.EQ) {
    return "use ':=' to assign; '=' compares";
  }

  return undefined;
}
