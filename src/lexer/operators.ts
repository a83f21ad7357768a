/**
 * Operator and Keyword Lookup Tables
 */

import { TOKEN_TYPES, type FixedTokenType } from '../token-types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, FixedTokenType> = new Map([
  ['::', TOKEN_TYPES.CONS],
  [':=', TOKEN_TYPES.COLON_EQ],
  ['<>', TOKEN_TYPES.NOT_EQ],
  ['<=', TOKEN_TYPES.LE],
  ['>=', TOKEN_TYPES.GE],
  ['&&', TOKEN_TYPES.AND_AND],
  ['||', TOKEN_TYPES.OR_OR],
]);

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, FixedTokenType> =
  new Map([
    [',', TOKEN_TYPES.COMMA],
    ['(', TOKEN_TYPES.LPAREN],
    [')', TOKEN_TYPES.RPAREN],
    ['=', TOKEN_TYPES.EQ],
    [':', TOKEN_TYPES.COLON],
    ['~', TOKEN_TYPES.TILDE],
    ['+', TOKEN_TYPES.PLUS],
    ['-', TOKEN_TYPES.MINUS],
    ['*', TOKEN_TYPES.STAR],
    ['<', TOKEN_TYPES.LT],
    ['>', TOKEN_TYPES.GT],
    ['&', TOKEN_TYPES.AMPERSAND],
  ]);

/**
 * Keyword lookup table.
 * `true` and `false` are not listed: they lex to BOOL_LIT.
 */
export const KEYWORDS: ReadonlyMap<string, FixedTokenType> = new Map([
  ['fun', TOKEN_TYPES.FUN],
  ['val', TOKEN_TYPES.VAL],
  ['let', TOKEN_TYPES.LET],
  ['in', TOKEN_TYPES.IN],
  ['end', TOKEN_TYPES.END],
  ['if', TOKEN_TYPES.IF],
  ['then', TOKEN_TYPES.THEN],
  ['else', TOKEN_TYPES.ELSE],
  ['not', TOKEN_TYPES.NOT],
  ['mut', TOKEN_TYPES.MUT],
  ['while', TOKEN_TYPES.WHILE],
  ['do', TOKEN_TYPES.DO],
  ['mod', TOKEN_TYPES.MOD],
  ['div', TOKEN_TYPES.DIV],
  ['int', TOKEN_TYPES.INT],
  ['bool', TOKEN_TYPES.BOOL],
  ['real', TOKEN_TYPES.REAL],
  ['char', TOKEN_TYPES.CHAR],
  ['unit', TOKEN_TYPES.UNIT],
]);

export const BOOLEAN_LITERALS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['false', false],
]);
