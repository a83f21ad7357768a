/**
 * Token Readers
 * Functions to read specific token types from source.
 * Each reader returns the token it read, or the error covering the
 * malformed lexeme it consumed.
 */

import { Ident } from '../intern.js';
import { TOKEN_TYPES, type SpannedToken } from '../token-types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { BOOLEAN_LITERALS, KEYWORDS } from './operators.js';
import {
  advance,
  advanceCodePoint,
  isAtEnd,
  type LexerState,
  peek,
  spanFrom,
} from './state.js';

/** Largest value an INT_LIT may carry (2^64 - 1) */
export const MAX_INT_LITERAL = 18446744073709551615n;

const CHAR_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["'", "'"],
  ['"', '"'],
  ['\\', '\\'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['0', '\0'],
]);

function isLineBreak(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

function readDigits(state: LexerState): string {
  let value = '';
  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }
  return value;
}

export function readChar(state: LexerState): SpannedToken | LexerError {
  const start = state.pos;
  advance(state); // consume opening '

  const scalars: string[] = [];
  let unknownEscape: string | null = null;

  for (;;) {
    if (isAtEnd(state) || isLineBreak(peek(state))) {
      return new LexerError({ kind: 'UnterminatedChar' }, spanFrom(state, start));
    }

    const ch = peek(state);
    if (ch === "'") {
      advance(state); // consume closing '
      break;
    }

    if (ch === '\\') {
      advance(state); // consume backslash
      if (isAtEnd(state) || isLineBreak(peek(state))) continue;
      const escaped = advanceCodePoint(state);
      const resolved = CHAR_ESCAPES.get(escaped);
      if (resolved === undefined) {
        unknownEscape ??= escaped;
        scalars.push(escaped);
      } else {
        scalars.push(resolved);
      }
      continue;
    }

    scalars.push(advanceCodePoint(state));
  }

  const span = spanFrom(state, start);
  const [scalar] = scalars;
  if (scalar === undefined) {
    return new LexerError({ kind: 'EmptyChar' }, span);
  }
  if (scalars.length > 1) {
    return new LexerError({ kind: 'MultiChar' }, span);
  }
  if (unknownEscape !== null) {
    return new LexerError({ kind: 'UnknownEscape', char: unknownEscape }, span);
  }

  return makeToken(state, { type: TOKEN_TYPES.CHAR_LIT, value: scalar }, start);
}

/**
 * Read `digit+ (. digit*)? ([eE][+-]?digit*)?` or `. digit+ ([eE]...)?`.
 * Lexemes containing `.`, `e` or `E` are reals; the rest are integers.
 *
 * The exponent takes `digit*`, not `digit+`: `1e` and `1e+` stay one
 * lexeme and report InvalidFloat rather than ending the number before
 * the `e` and lexing `e` as an identifier.
 */
export function readNumber(state: LexerState): SpannedToken | LexerError {
  const start = state.pos;
  let value = '';

  if (peek(state) === '.') {
    value += advance(state); // consume .
    value += readDigits(state);
  } else {
    value += readDigits(state);
    if (peek(state) === '.') {
      value += advance(state); // consume .
      value += readDigits(state);
    }
  }

  if (peek(state) === 'e' || peek(state) === 'E') {
    value += advance(state); // consume e
    if (peek(state) === '+' || peek(state) === '-') {
      value += advance(state);
    }
    value += readDigits(state);
  }

  // Digits running straight into a name: resync after the whole run
  if (isIdentifierChar(peek(state))) {
    while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
      value += advance(state);
    }
    return new LexerError(
      { kind: 'InvalidNumberChar', lexeme: value },
      spanFrom(state, start)
    );
  }

  if (/[.eE]/.test(value)) {
    const real = Number(value);
    if (Number.isNaN(real)) {
      return new LexerError(
        { kind: 'InvalidFloat', lexeme: value },
        spanFrom(state, start)
      );
    }
    return makeToken(state, { type: TOKEN_TYPES.REAL_LIT, value: real }, start);
  }

  const int = BigInt(value);
  if (int > MAX_INT_LITERAL) {
    return new LexerError(
      { kind: 'InvalidInt', lexeme: value },
      spanFrom(state, start)
    );
  }
  return makeToken(state, { type: TOKEN_TYPES.INT_LIT, value: int }, start);
}

export function readIdentifier(state: LexerState): SpannedToken {
  const start = state.pos;
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const bool = BOOLEAN_LITERALS.get(value);
  if (bool !== undefined) {
    return makeToken(state, { type: TOKEN_TYPES.BOOL_LIT, value: bool }, start);
  }

  const keyword = KEYWORDS.get(value);
  if (keyword !== undefined) {
    return makeToken(state, { type: keyword }, start);
  }

  return makeToken(
    state,
    { type: TOKEN_TYPES.IDENTIFIER, value: Ident.intern(value) },
    start
  );
}
