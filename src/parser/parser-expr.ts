/**
 * Parser Extension: Expression Parsing
 * Precedence chain from || down to unary and borrow prefixes
 */

import { Parser } from './parser.js';
import type { BinaryOp, BorrowKind, ExprNode, UnaryOp } from '../ast-nodes.js';
import { joinSpans, type Spanned, spanned } from '../source-span.js';
import { TOKEN_TYPES } from '../token-types.js';
import { advance, check, withNesting } from './state.js';
import {
  ADDITIVE_OPS,
  COMPARISON_OPS,
  MULTIPLICATIVE_OPS,
  makeBinary,
  matchOperator,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): Spanned<ExprNode>;
    parseLogicalOr(): Spanned<ExprNode>;
    parseLogicalAnd(): Spanned<ExprNode>;
    parseComparison(): Spanned<ExprNode>;
    parseAdditive(): Spanned<ExprNode>;
    parseMultiplicative(): Spanned<ExprNode>;
    parseUnary(): Spanned<ExprNode>;
    parseBorrow(): Spanned<ExprNode>;
  }
}

// ============================================================
// EXPRESSION PARSING
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): Spanned<ExprNode> {
  return withNesting(this.state, () => this.parseLogicalOr());
};

// ============================================================
// BINARY PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseLogicalOr = function (this: Parser): Spanned<ExprNode> {
  let left = this.parseLogicalAnd();

  while (check(this.state, TOKEN_TYPES.OR_OR)) {
    const op = spanned<BinaryOp>('Or', advance(this.state).span);
    const right = this.parseLogicalAnd();
    left = makeBinary(left, op, right);
  }

  return left;
};

Parser.prototype.parseLogicalAnd = function (this: Parser): Spanned<ExprNode> {
  let left = this.parseComparison();

  while (check(this.state, TOKEN_TYPES.AND_AND)) {
    const op = spanned<BinaryOp>('And', advance(this.state).span);
    const right = this.parseComparison();
    left = makeBinary(left, op, right);
  }

  return left;
};

/**
 * Comparisons are accepted left-associatively; rejecting chains such as
 * `a < b < c` is left to semantic analysis.
 */
Parser.prototype.parseComparison = function (this: Parser): Spanned<ExprNode> {
  let left = this.parseAdditive();

  for (;;) {
    const op = matchOperator(this.state, COMPARISON_OPS);
    if (!op) break;
    const right = this.parseAdditive();
    left = makeBinary(left, op, right);
  }

  return left;
};

Parser.prototype.parseAdditive = function (this: Parser): Spanned<ExprNode> {
  let left = this.parseMultiplicative();

  for (;;) {
    const op = matchOperator(this.state, ADDITIVE_OPS);
    if (!op) break;
    const right = this.parseMultiplicative();
    left = makeBinary(left, op, right);
  }

  return left;
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): Spanned<ExprNode> {
  let left = this.parseUnary();

  for (;;) {
    const op = matchOperator(this.state, MULTIPLICATIVE_OPS);
    if (!op) break;
    const right = this.parseUnary();
    left = makeBinary(left, op, right);
  }

  return left;
};

// ============================================================
// PREFIX OPERATORS
// ============================================================

Parser.prototype.parseUnary = function (this: Parser): Spanned<ExprNode> {
  if (check(this.state, TOKEN_TYPES.TILDE, TOKEN_TYPES.NOT)) {
    const token = advance(this.state);
    const opName: UnaryOp = token.value.type === TOKEN_TYPES.TILDE ? 'Neg' : 'Not';
    const op = spanned(opName, token.span);
    const operand = withNesting(this.state, () => this.parseUnary());
    return spanned<ExprNode>(
      { type: 'Unary', op, operand },
      joinSpans(op.span, operand.span)
    );
  }
  return this.parseBorrow();
};

/**
 * borrow := '&' 'mut'? unary | primary
 * The `&mut` prefix is one operator whose span covers both tokens.
 */
Parser.prototype.parseBorrow = function (this: Parser): Spanned<ExprNode> {
  if (!check(this.state, TOKEN_TYPES.AMPERSAND)) {
    return this.parsePrimary();
  }

  const ampersand = advance(this.state);
  let kind: Spanned<BorrowKind> = spanned<BorrowKind>('Ref', ampersand.span);
  if (check(this.state, TOKEN_TYPES.MUT)) {
    const mut = advance(this.state);
    kind = spanned<BorrowKind>('RefMut', joinSpans(ampersand.span, mut.span));
  }

  const operand = withNesting(this.state, () => this.parseUnary());
  return spanned<ExprNode>(
    { type: 'Borrow', kind, operand },
    joinSpans(kind.span, operand.span)
  );
};
