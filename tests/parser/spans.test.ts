/**
 * Kestrel Parser Tests: span invariants
 * Compound nodes join their children; whole inputs cover their text
 */

import { describe, expect, it } from 'vitest';
import {
  collectSpans,
  type ExprNode,
  joinSpans,
  type Span,
  type Spanned,
  type StmtNode,
} from '../../src/index.js';
import { parseExpr } from '../helpers/syntax.js';

/** Spans an expression node must join, or null for leaves */
function childSpans(expr: Spanned<ExprNode>): Span[] | null {
  const node = expr.value;
  switch (node.type) {
    case 'Literal':
    case 'Local':
      return null;
    case 'Unary':
      return [node.op.span, node.operand.span];
    case 'Borrow':
      return [node.kind.span, node.operand.span];
    case 'Binary':
      return [node.left.span, node.op.span, node.right.span];
    case 'If':
      return [node.condition.span, node.thenBranch.span, node.elseBranch.span];
    case 'Let':
      return [...node.stmts.map((s) => s.span), node.body.span];
    case 'Apply':
      return [node.callee.span, node.argument.span];
  }
}

function children(expr: Spanned<ExprNode>): Spanned<ExprNode>[] {
  const node = expr.value;
  switch (node.type) {
    case 'Literal':
    case 'Local':
      return [];
    case 'Unary':
    case 'Borrow':
      return [node.operand];
    case 'Binary':
      return [node.left, node.right];
    case 'If':
      return [node.condition, node.thenBranch, node.elseBranch];
    case 'Let':
      return [...node.stmts.flatMap(stmtExprs), node.body];
    case 'Apply':
      return [node.callee, node.argument];
  }
}

function stmtExprs(stmt: Spanned<StmtNode>): Spanned<ExprNode>[] {
  const node = stmt.value;
  switch (node.type) {
    case 'Val':
      return [node.binding.expr];
    case 'Assign':
      return [node.expr];
    case 'While':
      return [node.condition, ...stmtExprs(node.body)];
  }
}

/** A parenthesised node takes the span of its parentheses */
function isParenthesised(span: Span, joined: Span, source: string): boolean {
  return (
    span.start < joined.start &&
    span.end > joined.end &&
    source.charAt(span.start) === '(' &&
    source.charAt(span.end - 1) === ')'
  );
}

/** Collect every operator-bearing node whose span is not the join of its children */
function mismatches(expr: Spanned<ExprNode>, source: string): Spanned<ExprNode>[] {
  const found: Spanned<ExprNode>[] = [];
  const visit = (e: Spanned<ExprNode>): void => {
    const spans = childSpans(e);
    // let and if also include their keywords, so they only need to contain the join
    if (spans && e.value.type !== 'Let' && e.value.type !== 'If') {
      const joined = spans.reduce(joinSpans);
      const exact = joined.start === e.span.start && joined.end === e.span.end;
      if (!exact && !isParenthesised(e.span, joined, source)) {
        found.push(e);
      }
    }
    children(e).forEach(visit);
  };
  visit(expr);
  return found;
}

describe('Parser: spans', () => {
  const wellFormed = [
    '1 + 2 * 3',
    'a && b || not c',
    '~ ~ x',
    '&mut y <= 10',
    'if a then b - 1 else c div 2',
    'let val x = 1 while x < 3 do x := x + 1 in x * 2 end',
    'f - (g - h)',
  ];

  it.each(wellFormed)('joins child spans in every compound node: %s', (input) => {
    expect(mismatches(parseExpr(input), input)).toEqual([]);
  });

  it('widens a parenthesised node to its parentheses and nothing else', () => {
    const input = 'f - (g - h)';
    const root = parseExpr(input);
    if (root.value.type !== 'Binary') throw new Error('expected Binary');
    expect(root.value.right.span).toEqual({ src: 0, start: 4, end: 11 });
    expect(isParenthesised(root.value.right.span, { src: 0, start: 5, end: 10 }, input)).toBe(
      true
    );
    expect(isParenthesised(root.span, { src: 0, start: 0, end: 11 }, input)).toBe(false);
  });

  it.each(wellFormed)('covers the input without surrounding whitespace: %s', (input) => {
    const padded = `  ${input}\n `;
    expect(parseExpr(padded).span).toEqual({
      src: 0,
      start: 2,
      end: 2 + input.length,
    });
  });

  it.each(wellFormed)('keeps every reachable span inside the root: %s', (input) => {
    const root = parseExpr(input);
    for (const span of collectSpans({ kind: 'expr', node: root })) {
      expect(span.start).toBeGreaterThanOrEqual(root.span.start);
      expect(span.end).toBeLessThanOrEqual(root.span.end);
    }
  });
});
