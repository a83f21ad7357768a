/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import { spanned } from '../source-span.js';
import type { FixedTokenType, SpannedToken, Token } from '../token-types.js';
import { advance, type LexerState, spanFrom } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f';
}

export function makeToken(
  state: LexerState,
  token: Token,
  start: number
): SpannedToken {
  return spanned(token, spanFrom(state, start));
}

/** Advance n times and return a fixed token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: FixedTokenType,
  start: number
): SpannedToken {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(state, { type }, start);
}
