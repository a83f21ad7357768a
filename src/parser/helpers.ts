/**
 * Parser Helpers
 * Lookahead predicates, operator tables and node builders
 * @internal This module contains internal parser utilities
 */

import type {
  BinaryOp,
  ExprNode,
  PrimType,
} from '../ast-nodes.js';
import type { Ident } from '../intern.js';
import { joinSpans, type Spanned, spanned } from '../source-span.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import { type ParserState, advance, check, current, peek, unexpectedToken } from './state.js';

// ============================================================
// OPERATOR TABLES
// ============================================================

/** @internal */
export const COMPARISON_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([
  [TOKEN_TYPES.EQ, 'Eq'],
  [TOKEN_TYPES.NOT_EQ, 'NotEq'],
  [TOKEN_TYPES.LT, 'Less'],
  [TOKEN_TYPES.LE, 'LessEq'],
  [TOKEN_TYPES.GT, 'Greater'],
  [TOKEN_TYPES.GE, 'GreaterEq'],
]);

/** @internal */
export const ADDITIVE_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([
  [TOKEN_TYPES.MINUS, 'Sub'],
  [TOKEN_TYPES.PLUS, 'Add'],
]);

/** @internal */
export const MULTIPLICATIVE_OPS: ReadonlyMap<TokenType, BinaryOp> = new Map<
  TokenType,
  BinaryOp
>([
  [TOKEN_TYPES.STAR, 'Mul'],
  [TOKEN_TYPES.DIV, 'Div'],
  [TOKEN_TYPES.MOD, 'Rem'],
]);

/** @internal */
export const TYPE_KEYWORDS: ReadonlyMap<TokenType, PrimType> = new Map<
  TokenType,
  PrimType
>([
  [TOKEN_TYPES.INT, 'Int'],
  [TOKEN_TYPES.BOOL, 'Bool'],
  [TOKEN_TYPES.CHAR, 'Char'],
  [TOKEN_TYPES.REAL, 'Real'],
  [TOKEN_TYPES.UNIT, 'Unit'],
]);

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check for a statement start: val, while, or name :=
 * @internal
 */
export function isStatementStart(state: ParserState): boolean {
  if (check(state, TOKEN_TYPES.VAL, TOKEN_TYPES.WHILE)) {
    return true;
  }
  return (
    check(state, TOKEN_TYPES.IDENTIFIER) &&
    peek(state, 1).value.type === TOKEN_TYPES.COLON_EQ
  );
}

/**
 * Check for a function parameter start: name, _ or (
 * @internal
 */
export function isParamStart(state: ParserState): boolean {
  return check(state, TOKEN_TYPES.IDENTIFIER, TOKEN_TYPES.LPAREN);
}

// ============================================================
// TOKEN CONSUMERS
// ============================================================

/**
 * Consume an operator found in `table`, or return null.
 * @internal
 */
export function matchOperator<Op>(
  state: ParserState,
  table: ReadonlyMap<TokenType, Op>
): Spanned<Op> | null {
  const token = current(state);
  const op = table.get(token.value.type);
  if (op === undefined) return null;
  advance(state);
  return spanned(op, token.span);
}

/**
 * Consume an identifier or fail with UnexpectedToken.
 * @internal
 */
export function expectIdent(state: ParserState): Spanned<Ident> {
  const token = current(state);
  if (token.value.type !== TOKEN_TYPES.IDENTIFIER) {
    throw unexpectedToken(state, 'identifier');
  }
  advance(state);
  return spanned(token.value.value, token.span);
}

// ============================================================
// NODE BUILDERS
// ============================================================

/**
 * Binary node whose span joins its operands.
 * @internal
 */
export function makeBinary(
  left: Spanned<ExprNode>,
  op: Spanned<BinaryOp>,
  right: Spanned<ExprNode>
): Spanned<ExprNode> {
  return spanned<ExprNode>(
    { type: 'Binary', left, op, right },
    joinSpans(left.span, right.span)
  );
}
