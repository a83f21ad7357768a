/**
 * Parser Extension: Control Flow
 * let blocks, conditionals and statements
 */

import { Parser } from './parser.js';
import type { ExprNode, StmtNode, ValBinding } from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { joinSpans, type Span, type Spanned, spanned } from '../source-span.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  current,
  expect,
  unexpectedToken,
  withNesting,
} from './state.js';
import { expectIdent, isStatementStart } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseLet(): Spanned<ExprNode>;
    parseIf(): Spanned<ExprNode>;
    parseStatement(): Spanned<StmtNode>;
    parseValBinding(): { binding: ValBinding; span: Span };
  }
}

// ============================================================
// LET
// ============================================================

/**
 * let := 'let' stmt* 'in' expr 'end'
 */
Parser.prototype.parseLet = function (this: Parser): Spanned<ExprNode> {
  const open = expect(this.state, TOKEN_TYPES.LET);

  const stmts: Spanned<StmtNode>[] = [];
  while (isStatementStart(this.state)) {
    stmts.push(this.parseStatement());
  }

  if (!check(this.state, TOKEN_TYPES.IN)) {
    throw unexpectedToken(this.state, "'in' or a statement");
  }
  advance(this.state); // consume in

  const body = this.parseExpression();

  if (!check(this.state, TOKEN_TYPES.END)) {
    throw new ParseError({
      kind: 'ExpectedDelimiter',
      expected: 'end',
      opened: 'let',
      openSpan: open.span,
      endSpan: current(this.state).span,
    });
  }
  const close = advance(this.state);

  return spanned<ExprNode>(
    { type: 'Let', stmts, body },
    joinSpans(open.span, close.span)
  );
};

// ============================================================
// CONDITIONALS
// ============================================================

/**
 * if := 'if' expr 'then' expr 'else' expr
 */
Parser.prototype.parseIf = function (this: Parser): Spanned<ExprNode> {
  const open = expect(this.state, TOKEN_TYPES.IF);
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.THEN);
  const thenBranch = this.parseExpression();
  expect(this.state, TOKEN_TYPES.ELSE);
  const elseBranch = this.parseExpression();

  return spanned<ExprNode>(
    { type: 'If', condition, thenBranch, elseBranch },
    joinSpans(open.span, elseBranch.span)
  );
};

// ============================================================
// STATEMENTS
// ============================================================

/**
 * stmt := 'val' ident (':' type)? '=' expr
 *       | ident ':=' expr
 *       | 'while' expr 'do' stmt
 */
Parser.prototype.parseStatement = function (this: Parser): Spanned<StmtNode> {
  if (check(this.state, TOKEN_TYPES.VAL)) {
    const { binding, span } = this.parseValBinding();
    return spanned<StmtNode>({ type: 'Val', binding }, span);
  }

  if (check(this.state, TOKEN_TYPES.WHILE)) {
    const open = advance(this.state);
    const condition = this.parseExpression();
    expect(this.state, TOKEN_TYPES.DO);
    const body = withNesting(this.state, () => this.parseStatement());
    return spanned<StmtNode>(
      { type: 'While', condition, body },
      joinSpans(open.span, body.span)
    );
  }

  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    const target = expectIdent(this.state);
    expect(this.state, TOKEN_TYPES.COLON_EQ);
    const expr = this.parseExpression();
    return spanned<StmtNode>(
      { type: 'Assign', target, expr },
      joinSpans(target.span, expr.span)
    );
  }

  throw unexpectedToken(this.state, 'a statement');
};

/**
 * 'val' ident (':' type)? '=' expr
 * Shared by statements and top-level declarations.
 */
Parser.prototype.parseValBinding = function (this: Parser): {
  binding: ValBinding;
  span: Span;
} {
  const open = expect(this.state, TOKEN_TYPES.VAL);
  const name = expectIdent(this.state);

  let ty: ValBinding['ty'] = null;
  if (check(this.state, TOKEN_TYPES.COLON)) {
    advance(this.state); // consume :
    ty = this.parseType().value;
  }

  expect(this.state, TOKEN_TYPES.EQ);
  const expr = this.parseExpression();

  return { binding: { name, ty, expr }, span: joinSpans(open.span, expr.span) };
};
