import { TOKEN_TYPES, type TokenType } from './token-types.js';

// ============================================================
// HIGHLIGHT CATEGORIES
// ============================================================

export type HighlightCategory =
  | 'keyword'
  | 'operator'
  | 'string'
  | 'number'
  | 'bool'
  | 'typeName'
  | 'variableName'
  | 'punctuation'
  | 'bracket';

// ============================================================
// TOKEN HIGHLIGHT MAP
// ============================================================

export const TOKEN_HIGHLIGHT_MAP: ReadonlyMap<TokenType, HighlightCategory> =
  new Map<TokenType, HighlightCategory>([
    // Literals
    [TOKEN_TYPES.INT_LIT, 'number'],
    [TOKEN_TYPES.REAL_LIT, 'number'],
    [TOKEN_TYPES.BOOL_LIT, 'bool'],
    [TOKEN_TYPES.CHAR_LIT, 'string'],

    // Variables
    [TOKEN_TYPES.IDENTIFIER, 'variableName'],

    // Keywords
    [TOKEN_TYPES.FUN, 'keyword'],
    [TOKEN_TYPES.VAL, 'keyword'],
    [TOKEN_TYPES.LET, 'keyword'],
    [TOKEN_TYPES.IN, 'keyword'],
    [TOKEN_TYPES.END, 'keyword'],
    [TOKEN_TYPES.IF, 'keyword'],
    [TOKEN_TYPES.THEN, 'keyword'],
    [TOKEN_TYPES.ELSE, 'keyword'],
    [TOKEN_TYPES.WHILE, 'keyword'],
    [TOKEN_TYPES.DO, 'keyword'],
    [TOKEN_TYPES.MUT, 'keyword'],

    // Word operators
    [TOKEN_TYPES.NOT, 'operator'],
    [TOKEN_TYPES.MOD, 'operator'],
    [TOKEN_TYPES.DIV, 'operator'],

    // Types
    [TOKEN_TYPES.INT, 'typeName'],
    [TOKEN_TYPES.BOOL, 'typeName'],
    [TOKEN_TYPES.REAL, 'typeName'],
    [TOKEN_TYPES.CHAR, 'typeName'],
    [TOKEN_TYPES.UNIT, 'typeName'],

    // Operators
    [TOKEN_TYPES.EQ, 'operator'],
    [TOKEN_TYPES.COLON_EQ, 'operator'],
    [TOKEN_TYPES.CONS, 'operator'],
    [TOKEN_TYPES.TILDE, 'operator'],
    [TOKEN_TYPES.PLUS, 'operator'],
    [TOKEN_TYPES.MINUS, 'operator'],
    [TOKEN_TYPES.STAR, 'operator'],
    [TOKEN_TYPES.NOT_EQ, 'operator'],
    [TOKEN_TYPES.LT, 'operator'],
    [TOKEN_TYPES.LE, 'operator'],
    [TOKEN_TYPES.GT, 'operator'],
    [TOKEN_TYPES.GE, 'operator'],
    [TOKEN_TYPES.AND_AND, 'operator'],
    [TOKEN_TYPES.OR_OR, 'operator'],
    [TOKEN_TYPES.AMPERSAND, 'operator'],

    // Punctuation
    [TOKEN_TYPES.COMMA, 'punctuation'],
    [TOKEN_TYPES.COLON, 'punctuation'],

    // Brackets
    [TOKEN_TYPES.LPAREN, 'bracket'],
    [TOKEN_TYPES.RPAREN, 'bracket'],

    // Intentionally unmapped: EOF
  ]);
