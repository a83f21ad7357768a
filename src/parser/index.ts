/**
 * Kestrel Parser
 * Main entry points and re-exports
 */

import type { DeclNode, ExprNode } from '../ast-nodes.js';
import { type KestrelError, ParseError } from '../error-classes.js';
import { lex } from '../lexer/index.js';
import type { SourceId, Spanned } from '../source-span.js';
import type { SpannedToken } from '../token-types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-expr.js';
import './parser-literals.js';
import './parser-control.js';
import './parser-decls.js';

// ============================================================
// RESULTS
// ============================================================

export type ParseResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: ParseError };

/** Lex and parse in one step; errors hold every lexer error or the one parse error */
export type SourceResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly errors: KestrelError[] };

function runParser<T>(
  tokens: readonly SpannedToken[],
  entry: (parser: Parser) => T
): ParseResult<T> {
  const parser = new Parser(tokens);
  try {
    return { success: true, value: entry(parser) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { success: false, error };
    }
    throw error;
  }
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a token stream holding exactly one expression.
 *
 * Nesting deeper than MAX_NESTING_DEPTH (parentheses, prefix operators,
 * `let`/`if`, `while` bodies, typed parameters) fails with a
 * NestingTooDeep parse error.
 *
 * @throws {TypeError} when the stream does not end with EOF
 *
 * @example
 * ```typescript
 * const lexed = lex(0, '1 - 2 - 3');
 * if (lexed.success) {
 *   const result = parseExpression(lexed.tokens);
 * }
 * ```
 */
export function parseExpression(
  tokens: readonly SpannedToken[]
): ParseResult<Spanned<ExprNode>> {
  return runParser(tokens, (parser) => parser.parseExpressionInput());
}

/** Parse a token stream holding exactly one `val` or `fun` declaration */
export function parseDeclaration(
  tokens: readonly SpannedToken[]
): ParseResult<Spanned<DeclNode>> {
  return runParser(tokens, (parser) => parser.parseDeclarationInput());
}

/** Parse a token stream holding any number of declarations */
export function parseProgram(
  tokens: readonly SpannedToken[]
): ParseResult<Spanned<DeclNode>[]> {
  return runParser(tokens, (parser) => parser.parseProgram());
}

// ============================================================
// SOURCE ENTRY POINT
// ============================================================

interface ParseModes {
  expression: Spanned<ExprNode>;
  declaration: Spanned<DeclNode>;
  program: Spanned<DeclNode>[];
}

export type ParseMode = keyof ParseModes;

const PARSERS: {
  readonly [M in ParseMode]: (
    tokens: readonly SpannedToken[]
  ) => ParseResult<ParseModes[M]>;
} = {
  expression: parseExpression,
  declaration: parseDeclaration,
  program: parseProgram,
};

/**
 * Lex `input` and parse it according to `mode`.
 * Parsing is skipped when lexing reported errors.
 */
export function parseSource<M extends ParseMode>(
  src: SourceId,
  input: string,
  mode: M
): SourceResult<ParseModes[M]> {
  const lexed = lex(src, input);
  if (!lexed.success) {
    return { success: false, errors: lexed.errors.map((e) => e.value) };
  }

  const parsed = PARSERS[mode](lexed.tokens);
  if (!parsed.success) {
    return { success: false, errors: [parsed.error] };
  }
  return { success: true, value: parsed.value };
}

export { Parser } from './parser.js';
export {
  createParserState,
  MAX_NESTING_DEPTH,
  type ParserState,
} from './state.js';
