/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import { createSpan, type SourceId, type Span } from '../source-span.js';

export interface LexerState {
  readonly src: SourceId;
  readonly source: string;
  pos: number;
}

export function createLexerState(src: SourceId, source: string): LexerState {
  return { src, source, pos: 0 };
}

/** Span from `start` to the current position */
export function spanFrom(state: LexerState, start: number): Span {
  return createSpan(state.src, start, state.pos);
}

/** Character (UTF-16 unit) at `pos + offset`, or '' past the end */
export function peek(state: LexerState, offset = 0): string {
  return state.source.charAt(state.pos + offset);
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** Consume one character */
export function advance(state: LexerState): string {
  const ch = state.source.charAt(state.pos);
  state.pos++;
  return ch;
}

/** Consume one Unicode scalar value (a surrogate pair counts as one) */
export function advanceCodePoint(state: LexerState): string {
  const codePoint = state.source.codePointAt(state.pos);
  if (codePoint === undefined) return '';
  const ch = String.fromCodePoint(codePoint);
  state.pos += ch.length;
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
