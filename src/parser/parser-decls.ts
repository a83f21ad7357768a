/**
 * Parser Extension: Declarations
 * Top-level val and fun declarations, parameters and whole programs
 */

import { Parser } from './parser.js';
import type { DeclNode, ExprNode, ParamNode, PrimType } from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import { joinSpans, type Spanned, spanned } from '../source-span.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  current,
  expect,
  unexpectedToken,
  withNesting,
} from './state.js';
import { expectIdent, isParamStart } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseDeclaration(): Spanned<DeclNode>;
    parseFunc(): Spanned<DeclNode>;
    parseParam(): Spanned<ParamNode>;
    parseProgram(): Spanned<DeclNode>[];
    parseExpressionInput(): Spanned<ExprNode>;
    parseDeclarationInput(): Spanned<DeclNode>;
    expectEnd(): void;
  }
}

// ============================================================
// DECLARATIONS
// ============================================================

/**
 * decl := 'val' ident (':' type)? '=' expr
 *       | 'fun' ident param* (':' type)? '=' expr
 */
Parser.prototype.parseDeclaration = function (this: Parser): Spanned<DeclNode> {
  if (check(this.state, TOKEN_TYPES.VAL)) {
    const { binding, span } = this.parseValBinding();
    return spanned<DeclNode>({ type: 'Val', binding }, span);
  }

  if (check(this.state, TOKEN_TYPES.FUN)) {
    return this.parseFunc();
  }

  throw unexpectedToken(this.state, "'val' or 'fun'");
};

Parser.prototype.parseFunc = function (this: Parser): Spanned<DeclNode> {
  const open = expect(this.state, TOKEN_TYPES.FUN);
  const name = expectIdent(this.state);

  const params: Spanned<ParamNode>[] = [];
  while (isParamStart(this.state)) {
    params.push(this.parseParam());
  }

  let returnTy: Spanned<PrimType> | null = null;
  if (check(this.state, TOKEN_TYPES.COLON)) {
    advance(this.state); // consume :
    returnTy = this.parseType();
  }

  expect(this.state, TOKEN_TYPES.EQ);
  const body = this.parseExpression();

  return spanned<DeclNode>(
    { type: 'Func', func: { name, params, returnTy, body } },
    joinSpans(open.span, body.span)
  );
};

/**
 * param := ident | '_' | '(' param ':' type ')'
 */
Parser.prototype.parseParam = function (this: Parser): Spanned<ParamNode> {
  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    const name = expectIdent(this.state);
    if (name.value.text === '_') {
      return spanned<ParamNode>({ type: 'Wildcard' }, name.span);
    }
    return spanned<ParamNode>({ type: 'Ident', name: name.value }, name.span);
  }

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    const open = advance(this.state);
    const param = withNesting(this.state, () => this.parseParam());
    expect(this.state, TOKEN_TYPES.COLON);
    const ty = this.parseType();

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

    return spanned<ParamNode>(
      { type: 'Typed', param, ty: ty.value },
      joinSpans(open.span, close.span)
    );
  }

  throw unexpectedToken(this.state, 'a parameter');
};

// ============================================================
// WHOLE INPUTS
// ============================================================

/** program := decl* EOF */
Parser.prototype.parseProgram = function (this: Parser): Spanned<DeclNode>[] {
  const decls: Spanned<DeclNode>[] = [];
  while (!check(this.state, TOKEN_TYPES.EOF)) {
    decls.push(this.parseDeclaration());
  }
  return decls;
};

Parser.prototype.parseExpressionInput = function (
  this: Parser
): Spanned<ExprNode> {
  const expr = this.parseExpression();
  this.expectEnd();
  return expr;
};

Parser.prototype.parseDeclarationInput = function (
  this: Parser
): Spanned<DeclNode> {
  const decl = this.parseDeclaration();
  this.expectEnd();
  return decl;
};

Parser.prototype.expectEnd = function (this: Parser): void {
  if (!check(this.state, TOKEN_TYPES.EOF)) {
    throw unexpectedToken(this.state, 'end of input');
  }
};
