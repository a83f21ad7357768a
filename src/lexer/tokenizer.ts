/**
 * Tokenizer
 * Main tokenization logic
 */

import { type SourceId, type Spanned, spanned } from '../source-span.js';
import type { SpannedToken } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { LexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readChar, readIdentifier, readNumber } from './readers.js';
import {
  advance,
  advanceCodePoint,
  createLexerState,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  spanFrom,
} from './state.js';

export type LexResult =
  | { readonly success: true; readonly tokens: SpannedToken[] }
  | { readonly success: false; readonly errors: Spanned<LexerError>[] };

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

function invalidToken(state: LexerState, start: number): LexerError {
  const lexeme = advanceCodePoint(state);
  return new LexerError({ kind: 'InvalidToken', lexeme }, spanFrom(state, start));
}

/**
 * Read the next token, or the error for the lexeme just consumed.
 * Always consumes at least one character unless at end of input.
 */
export function nextToken(state: LexerState): SpannedToken | LexerError {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    return makeToken(state, { type: TOKEN_TYPES.EOF }, state.pos);
  }

  const start = state.pos;
  const ch = peek(state);

  // Character literal
  if (ch === "'") {
    return readChar(state);
  }

  // Number (positive only - negation is the ~ operator)
  if (isDigit(ch) || (ch === '.' && isDigit(peek(state, 1)))) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Two-character operators (lookup table)
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS.get(twoChar);
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS.get(ch);
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, start);
  }

  // Lone '|', '.' without digits, anything else
  return invalidToken(state, start);
}

/**
 * Convert source text into span-tagged tokens.
 *
 * Scans the whole input even after errors; succeeds only when no error was
 * recorded. The token list ends with exactly one EOF at `[len, len)`.
 *
 * @example
 * ```typescript
 * const result = lex(0, '1 < 2');
 * if (result.success) {
 *   result.tokens.map((t) => t.value.type); // ['INT_LIT', 'LT', 'INT_LIT', 'EOF']
 * }
 * ```
 */
export function lex(src: SourceId, input: string): LexResult {
  const state = createLexerState(src, input);
  const tokens: SpannedToken[] = [];
  const errors: Spanned<LexerError>[] = [];

  for (;;) {
    const next = nextToken(state);
    if (next instanceof LexerError) {
      errors.push(spanned(next, next.span));
      continue;
    }
    tokens.push(next);
    if (next.value.type === TOKEN_TYPES.EOF) break;
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, tokens };
}
