/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError, type LexErrorKind } from './errors.js';
export { createLexerState, type LexerState } from './state.js';
export { lex, nextToken, type LexResult } from './tokenizer.js';
export { MAX_INT_LITERAL } from './readers.js';
export { KEYWORDS } from './operators.js';
