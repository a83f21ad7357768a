/**
 * Lexer Errors
 */

import type { Span } from '../source-span.js';
import { KestrelError, lookupDefinition } from '../error-classes.js';
import { renderMessage } from '../error-registry.js';

// ============================================================
// LEXER ERRORS
// ============================================================

export type LexErrorKind =
  | { readonly kind: 'InvalidInt'; readonly lexeme: string }
  | { readonly kind: 'InvalidFloat'; readonly lexeme: string }
  | { readonly kind: 'EmptyChar' }
  | { readonly kind: 'MultiChar' }
  | { readonly kind: 'UnknownEscape'; readonly char: string }
  | { readonly kind: 'UnterminatedChar' }
  | { readonly kind: 'InvalidNumberChar'; readonly lexeme: string }
  | { readonly kind: 'InvalidToken'; readonly lexeme: string };

const LEX_ERROR_IDS: Record<LexErrorKind['kind'], string> = {
  InvalidInt: 'lex::invalid_int',
  InvalidFloat: 'lex::invalid_float',
  EmptyChar: 'lex::empty_char',
  MultiChar: 'lex::multi_char',
  UnknownEscape: 'lex::unknown_escape',
  UnterminatedChar: 'lex::unterminated_char',
  InvalidNumberChar: 'lex::invalid_number_char',
  InvalidToken: 'lex::invalid_token',
};

/** Lexical error; the lexer collects these and keeps scanning */
export class LexerError extends KestrelError {
  readonly kind: LexErrorKind;
  readonly span: Span;

  constructor(kind: LexErrorKind, span: Span) {
    const errorId = LEX_ERROR_IDS[kind.kind];
    const definition = lookupDefinition(errorId, 'lexer');
    const context: Record<string, unknown> = { ...kind };

    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      labels: [{ span, message: renderMessage(definition.label, context) }],
      help: definition.help,
      context,
    });

    this.name = 'LexerError';
    this.kind = kind;
    this.span = span;
  }
}
