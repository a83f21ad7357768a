import type { Ident } from './intern.js';
import type { Spanned } from './source-span.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INT_LIT: 'INT_LIT',
  REAL_LIT: 'REAL_LIT',
  BOOL_LIT: 'BOOL_LIT',
  CHAR_LIT: 'CHAR_LIT',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Keywords
  FUN: 'FUN',
  VAL: 'VAL',
  LET: 'LET',
  IN: 'IN',
  END: 'END',
  IF: 'IF',
  THEN: 'THEN',
  ELSE: 'ELSE',
  NOT: 'NOT',
  MUT: 'MUT',
  WHILE: 'WHILE',
  DO: 'DO',
  MOD: 'MOD',
  DIV: 'DIV',

  // Type keywords
  INT: 'INT',
  BOOL: 'BOOL',
  REAL: 'REAL',
  CHAR: 'CHAR',
  UNIT: 'UNIT',

  // Delimiters
  COMMA: 'COMMA', // ,
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )

  // Binding and typing
  EQ: 'EQ', // =
  COLON: 'COLON', // :
  COLON_EQ: 'COLON_EQ', // :=
  CONS: 'CONS', // ::

  // Arithmetic operators
  TILDE: 'TILDE', // ~
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *

  // Comparison operators
  NOT_EQ: 'NOT_EQ', // <>
  LT: 'LT', // <
  LE: 'LE', // <=
  GT: 'GT', // >
  GE: 'GE', // >=

  // Boolean operators
  AND_AND: 'AND_AND', // &&
  OR_OR: 'OR_OR', // ||

  // Borrow
  AMPERSAND: 'AMPERSAND', // &

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Token types that carry a payload */
export type PayloadTokenType =
  | typeof TOKEN_TYPES.INT_LIT
  | typeof TOKEN_TYPES.REAL_LIT
  | typeof TOKEN_TYPES.BOOL_LIT
  | typeof TOKEN_TYPES.CHAR_LIT
  | typeof TOKEN_TYPES.IDENTIFIER;

/** Token types whose lexeme is fixed */
export type FixedTokenType = Exclude<TokenType, PayloadTokenType>;

export type Token =
  | { readonly type: typeof TOKEN_TYPES.INT_LIT; readonly value: bigint }
  | { readonly type: typeof TOKEN_TYPES.REAL_LIT; readonly value: number }
  | { readonly type: typeof TOKEN_TYPES.BOOL_LIT; readonly value: boolean }
  | { readonly type: typeof TOKEN_TYPES.CHAR_LIT; readonly value: string }
  | { readonly type: typeof TOKEN_TYPES.IDENTIFIER; readonly value: Ident }
  | { readonly type: FixedTokenType };

export type SpannedToken = Spanned<Token>;

// ============================================================
// LEXEMES
// ============================================================

const FIXED_LEXEMES: Record<FixedTokenType, string> = {
  FUN: 'fun',
  VAL: 'val',
  LET: 'let',
  IN: 'in',
  END: 'end',
  IF: 'if',
  THEN: 'then',
  ELSE: 'else',
  NOT: 'not',
  MUT: 'mut',
  WHILE: 'while',
  DO: 'do',
  MOD: 'mod',
  DIV: 'div',
  INT: 'int',
  BOOL: 'bool',
  REAL: 'real',
  CHAR: 'char',
  UNIT: 'unit',
  COMMA: ',',
  LPAREN: '(',
  RPAREN: ')',
  EQ: '=',
  COLON: ':',
  COLON_EQ: ':=',
  CONS: '::',
  TILDE: '~',
  PLUS: '+',
  MINUS: '-',
  STAR: '*',
  NOT_EQ: '<>',
  LT: '<',
  LE: '<=',
  GT: '>',
  GE: '>=',
  AND_AND: '&&',
  OR_OR: '||',
  AMPERSAND: '&',
  EOF: '',
};

export function tokenLexeme(type: FixedTokenType): string {
  return FIXED_LEXEMES[type];
}

/**
 * Human-readable description of a token type, used for "expected ..."
 * in diagnostics.
 */
export function describeTokenType(type: TokenType): string {
  switch (type) {
    case TOKEN_TYPES.INT_LIT:
      return 'integer';
    case TOKEN_TYPES.REAL_LIT:
      return 'real';
    case TOKEN_TYPES.BOOL_LIT:
      return 'boolean';
    case TOKEN_TYPES.CHAR_LIT:
      return 'character';
    case TOKEN_TYPES.IDENTIFIER:
      return 'identifier';
    case TOKEN_TYPES.EOF:
      return 'end of input';
    default:
      return `'${FIXED_LEXEMES[type]}'`;
  }
}

/** Human-readable description of a token, used for "found ..." in diagnostics */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.INT_LIT:
      return `integer ${token.value}`;
    case TOKEN_TYPES.REAL_LIT:
      return `real ${token.value}`;
    case TOKEN_TYPES.BOOL_LIT:
      return `boolean ${token.value}`;
    case TOKEN_TYPES.CHAR_LIT:
      return `character ${JSON.stringify(token.value)}`;
    case TOKEN_TYPES.IDENTIFIER:
      return `identifier '${token.value.text}'`;
    default:
      return describeTokenType(token.type);
  }
}
