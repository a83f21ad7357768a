/**
 * Parser Extension: Primaries
 * Literals, names, unit, grouping and type annotations
 */

import { Parser } from './parser.js';
import type { ExprNode, LiteralValue, PrimType } from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { joinSpans, type Spanned, spanned, withSpan } from '../source-span.js';
import { describeToken, type Token, TOKEN_TYPES } from '../token-types.js';
import { advance, check, current, peek } from './state.js';
import { TYPE_KEYWORDS } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parsePrimary(): Spanned<ExprNode>;
    parseGrouped(): Spanned<ExprNode>;
    parseType(): Spanned<PrimType>;
  }
}

function literalOf(token: Token): LiteralValue | null {
  switch (token.type) {
    case TOKEN_TYPES.INT_LIT:
      return { kind: 'Int', value: token.value };
    case TOKEN_TYPES.REAL_LIT:
      return { kind: 'Real', value: token.value };
    case TOKEN_TYPES.CHAR_LIT:
      return { kind: 'Char', value: token.value };
    case TOKEN_TYPES.BOOL_LIT:
      return { kind: 'Bool', value: token.value };
    default:
      return null;
  }
}

// ============================================================
// PRIMARY EXPRESSIONS
// ============================================================

/**
 * primary := literal | ident | '(' ')' | '(' expr ')' | let | if
 */
Parser.prototype.parsePrimary = function (this: Parser): Spanned<ExprNode> {
  const token = current(this.state);

  const literal = literalOf(token.value);
  if (literal) {
    advance(this.state);
    return spanned<ExprNode>({ type: 'Literal', literal }, token.span);
  }

  if (token.value.type === TOKEN_TYPES.IDENTIFIER) {
    advance(this.state);
    return spanned<ExprNode>(
      { type: 'Local', name: token.value.value },
      token.span
    );
  }

  switch (token.value.type) {
    case TOKEN_TYPES.LPAREN:
      return this.parseGrouped();
    case TOKEN_TYPES.LET:
      return this.parseLet();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.EOF:
      throw new ParseError({ kind: 'UnexpectedEOF', span: token.span });
    default:
      throw new ParseError({
        kind: 'ExpectedPrimary',
        found: describeToken(token.value),
        span: token.span,
      });
  }
};

/**
 * `( )` is the unit literal; `( expr )` yields the inner expression
 * re-spanned to cover both parentheses.
 */
Parser.prototype.parseGrouped = function (this: Parser): Spanned<ExprNode> {
  const open = advance(this.state); // consume (

  if (check(this.state, TOKEN_TYPES.RPAREN)) {
    const close = advance(this.state);
    return spanned<ExprNode>(
      { type: 'Literal', literal: { kind: 'Unit' } },
      joinSpans(open.span, close.span)
    );
  }

  const inner = this.parseExpression();

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    throw new ParseError({
      kind: 'ExpectedDelimiter',
      expected: ')',
      opened: '(',
      openSpan: open.span,
      endSpan: current(this.state).span,
    });
  }

  const close = advance(this.state);
  return withSpan(inner, joinSpans(open.span, close.span));
};

// ============================================================
// TYPES
// ============================================================

/**
 * type := 'int' | 'bool' | 'char' | 'real' | 'unit' | '(' ')'
 */
Parser.prototype.parseType = function (this: Parser): Spanned<PrimType> {
  const token = current(this.state);

  const keyword = TYPE_KEYWORDS.get(token.value.type);
  if (keyword !== undefined) {
    advance(this.state);
    return spanned(keyword, token.span);
  }

  if (
    token.value.type === TOKEN_TYPES.LPAREN &&
    peek(this.state, 1).value.type === TOKEN_TYPES.RPAREN
  ) {
    advance(this.state); // consume (
    const close = advance(this.state);
    return spanned<PrimType>('Unit', joinSpans(token.span, close.span));
  }

  throw new ParseError({
    kind: 'ExpectedType',
    found: describeToken(token.value),
    span: token.span,
  });
};
