/**
 * AST Printer
 * Compact S-expression rendering of expressions, statements and
 * declarations, plus a span walker.
 *
 * @example
 * ```typescript
 * formatExpr(expr); // '(|| (&& a b) c)' for `a && b || c`
 * ```
 */

import {
  type BinaryOp,
  type BorrowKind,
  type DeclNode,
  type ExprNode,
  formatType,
  type LiteralValue,
  type ParamNode,
  type StmtNode,
  type UnaryOp,
  type ValBinding,
} from './ast-nodes.js';
import type { Span, Spanned } from './source-span.js';

// ============================================================
// OPERATOR LEXEMES
// ============================================================

const BINARY_LEXEMES: Record<BinaryOp, string> = {
  Add: '+',
  Sub: '-',
  Mul: '*',
  Div: 'div',
  Rem: 'mod',
  Eq: '=',
  NotEq: '<>',
  Less: '<',
  LessEq: '<=',
  Greater: '>',
  GreaterEq: '>=',
  And: '&&',
  Or: '||',
};

const UNARY_LEXEMES: Record<UnaryOp, string> = {
  Neg: '~',
  Not: 'not',
};

const BORROW_LEXEMES: Record<BorrowKind, string> = {
  Ref: '&',
  RefMut: '&mut',
};

const CHAR_ESCAPES: ReadonlyMap<string, string> = new Map([
  ["'", "\\'"],
  ['\\', '\\\\'],
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
  ['\0', '\\0'],
]);

// ============================================================
// LITERALS
// ============================================================

function formatReal(value: number): string {
  const text = String(value);
  // Keep integral reals distinguishable from ints
  return /[.eEIN]/.test(text) ? text : `${text}.0`;
}

export function formatLiteral(literal: LiteralValue): string {
  switch (literal.kind) {
    case 'Int':
      return literal.value.toString();
    case 'Real':
      return formatReal(literal.value);
    case 'Bool':
      return literal.value ? 'true' : 'false';
    case 'Char':
      return `'${CHAR_ESCAPES.get(literal.value) ?? literal.value}'`;
    case 'Unit':
      return '()';
  }
}

// ============================================================
// EXPRESSIONS
// ============================================================

export function formatExpr(expr: Spanned<ExprNode>): string {
  const node = expr.value;
  switch (node.type) {
    case 'Literal':
      return formatLiteral(node.literal);
    case 'Local':
      return node.name.text;
    case 'Unary':
      return `(${UNARY_LEXEMES[node.op.value]} ${formatExpr(node.operand)})`;
    case 'Borrow':
      return `(${BORROW_LEXEMES[node.kind.value]} ${formatExpr(node.operand)})`;
    case 'Binary':
      return `(${BINARY_LEXEMES[node.op.value]} ${formatExpr(node.left)} ${formatExpr(node.right)})`;
    case 'Let': {
      const stmts = node.stmts.map(formatStmt).join(' ');
      return `(let (${stmts}) ${formatExpr(node.body)})`;
    }
    case 'If':
      return `(if ${formatExpr(node.condition)} ${formatExpr(node.thenBranch)} ${formatExpr(node.elseBranch)})`;
    case 'Apply':
      return `(apply ${formatExpr(node.callee)} ${formatExpr(node.argument)})`;
  }
}

// ============================================================
// STATEMENTS AND DECLARATIONS
// ============================================================

function formatBinding(binding: ValBinding): string {
  const name = binding.name.value.text;
  const annotated = binding.ty === null ? name : `${name}:${formatType(binding.ty)}`;
  return `(val ${annotated} ${formatExpr(binding.expr)})`;
}

export function formatStmt(stmt: Spanned<StmtNode>): string {
  const node = stmt.value;
  switch (node.type) {
    case 'Val':
      return formatBinding(node.binding);
    case 'Assign':
      return `(:= ${node.target.value.text} ${formatExpr(node.expr)})`;
    case 'While':
      return `(while ${formatExpr(node.condition)} ${formatStmt(node.body)})`;
  }
}

export function formatParam(param: Spanned<ParamNode>): string {
  const node = param.value;
  switch (node.type) {
    case 'Ident':
      return node.name.text;
    case 'Wildcard':
      return '_';
    case 'Typed':
      return `(${formatParam(node.param)} : ${formatType(node.ty)})`;
  }
}

export function formatDecl(decl: Spanned<DeclNode>): string {
  const node = decl.value;
  if (node.type === 'Val') {
    return formatBinding(node.binding);
  }

  const { name, params, returnTy, body } = node.func;
  const head = `${name.value.text} (${params.map(formatParam).join(' ')})`;
  const ret = returnTy === null ? '' : ` : ${formatType(returnTy.value)}`;
  return `(fun ${head}${ret} ${formatExpr(body)})`;
}

// ============================================================
// SPAN WALKER
// ============================================================

type SpannedNode =
  | { readonly kind: 'expr'; readonly node: Spanned<ExprNode> }
  | { readonly kind: 'stmt'; readonly node: Spanned<StmtNode> }
  | { readonly kind: 'param'; readonly node: Spanned<ParamNode> }
  | { readonly kind: 'decl'; readonly node: Spanned<DeclNode> };

/**
 * Every span reachable from `root` in pre-order: node spans, operator
 * spans, names and annotations.
 */
export function collectSpans(root: SpannedNode): Span[] {
  const spans: Span[] = [];

  const bindingSpans = (binding: ValBinding): void => {
    spans.push(binding.name.span);
    expr(binding.expr);
  };

  const expr = (e: Spanned<ExprNode>): void => {
    spans.push(e.span);
    const node = e.value;
    switch (node.type) {
      case 'Literal':
      case 'Local':
        return;
      case 'Unary':
        spans.push(node.op.span);
        expr(node.operand);
        return;
      case 'Borrow':
        spans.push(node.kind.span);
        expr(node.operand);
        return;
      case 'Binary':
        expr(node.left);
        spans.push(node.op.span);
        expr(node.right);
        return;
      case 'Let':
        node.stmts.forEach(stmt);
        expr(node.body);
        return;
      case 'If':
        expr(node.condition);
        expr(node.thenBranch);
        expr(node.elseBranch);
        return;
      case 'Apply':
        expr(node.callee);
        expr(node.argument);
        return;
    }
  };

  const stmt = (s: Spanned<StmtNode>): void => {
    spans.push(s.span);
    const node = s.value;
    switch (node.type) {
      case 'Val':
        bindingSpans(node.binding);
        return;
      case 'Assign':
        spans.push(node.target.span);
        expr(node.expr);
        return;
      case 'While':
        expr(node.condition);
        stmt(node.body);
        return;
    }
  };

  const param = (p: Spanned<ParamNode>): void => {
    spans.push(p.span);
    if (p.value.type === 'Typed') {
      param(p.value.param);
    }
  };

  const decl = (d: Spanned<DeclNode>): void => {
    spans.push(d.span);
    const node = d.value;
    if (node.type === 'Val') {
      bindingSpans(node.binding);
      return;
    }
    spans.push(node.func.name.span);
    node.func.params.forEach(param);
    if (node.func.returnTy) spans.push(node.func.returnTy.span);
    expr(node.func.body);
  };

  switch (root.kind) {
    case 'expr':
      expr(root.node);
      break;
    case 'stmt':
      stmt(root.node);
      break;
    case 'param':
      param(root.node);
      break;
    case 'decl':
      decl(root.node);
      break;
  }

  return spans;
}
