/**
 * Kestrel Parser Tests: let, if and statements
 */

import { describe, expect, it } from 'vitest';
import { Ident } from '../../src/index.js';
import { nodeOf, parseExpr, sexpr } from '../helpers/syntax.js';

describe('Parser: control flow', () => {
  describe('let', () => {
    it('parses statements followed by a body', () => {
      expect(sexpr('let val x = 1 x := x + 1 in x end')).toBe(
        '(let ((val x 1) (:= x (+ x 1))) x)'
      );
    });

    it('parses a let without statements', () => {
      expect(sexpr('let in 0 end')).toBe('(let () 0)');
    });

    it('parses an annotated binding', () => {
      expect(sexpr('let val y : int = 2 in y end')).toBe('(let ((val y:int 2)) y)');
      expect(sexpr('let val u : () = () in u end')).toBe('(let ((val u:() ())) u)');
    });

    it('parses a while loop statement', () => {
      expect(sexpr('let while not done do x := 1 in x end')).toBe(
        '(let ((while (not done) (:= x 1))) x)'
      );
    });

    it('parses nested while loops', () => {
      expect(sexpr('let while a do while b do c := 0 in c end')).toBe(
        '(let ((while a (while b (:= c 0)))) c)'
      );
    });

    it('spans from let to end', () => {
      const expr = parseExpr('let val x = 1 in x end');
      expect(expr.span).toEqual({ src: 0, start: 0, end: 22 });
      const node = nodeOf(expr, 'Let');
      const [stmt] = node.stmts;
      expect(stmt?.span).toEqual({ src: 0, start: 4, end: 13 });
      expect(node.body.span).toEqual({ src: 0, start: 17, end: 18 });
    });

    it('records binding names with their spans', () => {
      const node = nodeOf(parseExpr('let val count = 0 in count end'), 'Let');
      const [stmt] = node.stmts;
      if (!stmt) throw new Error('missing statement');
      const val = nodeOf(stmt, 'Val');
      expect(val.binding.name).toEqual({
        value: Ident.intern('count'),
        span: { src: 0, start: 8, end: 13 },
      });
      expect(val.binding.ty).toBeNull();
    });

    it('is a primary inside larger expressions', () => {
      expect(sexpr('1 + let in 2 end * 3')).toBe('(+ 1 (* (let () 2) 3))');
    });
  });

  describe('if', () => {
    it('parses a conditional', () => {
      expect(sexpr('if a < b then a else b')).toBe('(if (< a b) a b)');
    });

    it('nests conditionals in the then branch', () => {
      expect(sexpr('if a then if b then 1 else 2 else 3')).toBe('(if a (if b 1 2) 3)');
    });

    it('lets the else branch extend as far as possible', () => {
      expect(sexpr('1 + if c then 1 else 2 * 3')).toBe('(+ 1 (if c 1 (* 2 3)))');
    });

    it('spans from if to the end of the else branch', () => {
      const expr = parseExpr('if ok then 1 else 2');
      expect(expr.span).toEqual({ src: 0, start: 0, end: 19 });
      const node = nodeOf(expr, 'If');
      expect(node.elseBranch.span).toEqual({ src: 0, start: 18, end: 19 });
    });
  });
});
