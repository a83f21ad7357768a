/**
 * Kestrel Lexer Tests
 * Token classification, payloads and span invariants
 */

import { describe, expect, it } from 'vitest';
import {
  createLexerState,
  Ident,
  KEYWORDS,
  lex,
  MAX_INT_LITERAL,
  nextToken,
  type SpannedToken,
  TOKEN_TYPES,
  tokenLexeme,
} from '../../src/index.js';
import { tokensOf, tokenTypes } from '../helpers/syntax.js';

function only(input: string): SpannedToken {
  const tokens = tokensOf(input);
  expect(tokens).toHaveLength(2);
  const [first] = tokens;
  if (!first) throw new Error('missing token');
  return first;
}

describe('Lexer', () => {
  describe('literals', () => {
    it('reads an integer with its span', () => {
      const token = only('42');
      expect(token.value).toEqual({ type: 'INT_LIT', value: 42n });
      expect(token.span).toEqual({ src: 0, start: 0, end: 2 });
    });

    it('reads the largest integer literal', () => {
      expect(only('18446744073709551615').value).toEqual({
        type: 'INT_LIT',
        value: MAX_INT_LITERAL,
      });
    });

    it.each([
      ['1.5', 1.5],
      ['.5', 0.5],
      ['1.', 1],
      ['2e3', 2000],
      ['1.5e-2', 0.015],
      ['1E+2', 100],
    ])('reads real %s', (input, expected) => {
      expect(only(input).value).toEqual({ type: 'REAL_LIT', value: expected });
    });

    it('stops a real at its second dot', () => {
      const tokens = tokensOf('1.2.3');
      expect(tokens.map((t) => t.value)).toEqual([
        { type: 'REAL_LIT', value: 1.2 },
        { type: 'REAL_LIT', value: 0.3 },
        { type: 'EOF' },
      ]);
      expect(tokens.map((t) => [t.span.start, t.span.end])).toEqual([
        [0, 3],
        [3, 5],
        [5, 5],
      ]);
    });

    it('reads booleans as literals', () => {
      expect(tokensOf('true false').map((t) => t.value)).toEqual([
        { type: 'BOOL_LIT', value: true },
        { type: 'BOOL_LIT', value: false },
        { type: 'EOF' },
      ]);
    });

    it('reads an escaped newline character', () => {
      const token = only("'\\n'");
      expect(token.value).toEqual({ type: 'CHAR_LIT', value: '\n' });
      expect(token.span).toEqual({ src: 0, start: 0, end: 4 });
    });

    it.each([
      ["'a'", 'a'],
      ["'\\''", "'"],
      ["'\\\"'", '"'],
      ["'\\\\'", '\\'],
      ["'\\t'", '\t'],
      ["'\\r'", '\r'],
      ["'\\0'", '\0'],
      ["'\"'", '"'],
    ])('reads character literal %s', (input, expected) => {
      expect(only(input).value).toEqual({ type: 'CHAR_LIT', value: expected });
    });

    it('reads non-ASCII characters as one scalar', () => {
      expect(only("'é'").value).toEqual({ type: 'CHAR_LIT', value: 'é' });
      const emoji = only("'😀'");
      expect(emoji.value).toEqual({ type: 'CHAR_LIT', value: '😀' });
      expect(emoji.span.end).toBe(4);
    });

    it('counts offsets in UTF-16 code units', () => {
      const tokens = tokensOf("'é' x");
      expect(tokens[0]?.span).toEqual({ src: 0, start: 0, end: 3 });
      expect(tokens[1]?.span).toEqual({ src: 0, start: 4, end: 5 });
    });
  });

  describe('identifiers and keywords', () => {
    it('interns identifiers', () => {
      const tokens = tokensOf('foo_1 Bar _ foo_1');
      expect(tokens.map((t) => t.value)).toEqual([
        { type: 'IDENTIFIER', value: Ident.intern('foo_1') },
        { type: 'IDENTIFIER', value: Ident.intern('Bar') },
        { type: 'IDENTIFIER', value: Ident.intern('_') },
        { type: 'IDENTIFIER', value: Ident.intern('foo_1') },
        { type: 'EOF' },
      ]);
      const [first, , , last] = tokens;
      if (first?.value.type !== 'IDENTIFIER' || last?.value.type !== 'IDENTIFIER') {
        throw new Error('expected identifiers');
      }
      expect(first.value.value).toBe(last.value.value);
    });

    it('reads every keyword as its keyword token', () => {
      for (const [text, type] of KEYWORDS) {
        expect(tokenTypes(text)).toEqual([type, 'EOF']);
      }
    });

    it('reads names that start with a keyword as identifiers', () => {
      expect(tokensOf('iffy end_ do2 trueish').map((t) => t.value.type)).toEqual([
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'EOF',
      ]);
    });
  });

  describe('operators and punctuation', () => {
    it('prefers two-character operators', () => {
      expect(tokenTypes(':: := : <> <= < >= > && & || ,')).toEqual([
        'CONS',
        'COLON_EQ',
        'COLON',
        'NOT_EQ',
        'LE',
        'LT',
        'GE',
        'GT',
        'AND_AND',
        'AMPERSAND',
        'OR_OR',
        'COMMA',
        'EOF',
      ]);
    });

    it('reads single-character operators', () => {
      expect(tokenTypes('( ) = ~ + - *')).toEqual([
        'LPAREN',
        'RPAREN',
        'EQ',
        'TILDE',
        'PLUS',
        'MINUS',
        'STAR',
        'EOF',
      ]);
    });

    it('splits adjacent tokens without whitespace', () => {
      expect(tokenTypes('a<=b')).toEqual(['IDENTIFIER', 'LE', 'IDENTIFIER', 'EOF']);
      expect(tokenTypes('&mut(x)')).toEqual([
        'AMPERSAND',
        'MUT',
        'LPAREN',
        'IDENTIFIER',
        'RPAREN',
        'EOF',
      ]);
    });

    it('reads a minus sign as an operator, never part of a number', () => {
      expect(tokenTypes('-1')).toEqual(['MINUS', 'INT_LIT', 'EOF']);
    });
  });

  describe('whitespace and end of input', () => {
    it('skips spaces, tabs, newlines, carriage returns and form feeds', () => {
      const tokens = tokensOf(' \t\r\n\f1');
      expect(tokens.map((t) => t.span)).toEqual([
        { src: 0, start: 5, end: 6 },
        { src: 0, start: 6, end: 6 },
      ]);
    });

    it('produces a single EOF for empty input', () => {
      expect(tokensOf('')).toEqual([
        { value: { type: 'EOF' }, span: { src: 0, start: 0, end: 0 } },
      ]);
    });

    it('tags spans with the given source id', () => {
      const result = lex(7, 'x');
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.tokens.map((t) => t.span.src)).toEqual([7, 7]);
    });
  });

  describe('nextToken', () => {
    it('reads one token at a time and repeats EOF at the end', () => {
      const state = createLexerState(0, 'val x');
      const first = nextToken(state);
      const second = nextToken(state);
      const third = nextToken(state);
      const fourth = nextToken(state);
      expect([first, second, third, fourth].map((t) =>
        'value' in t ? t.value.type : t.errorId
      )).toEqual(['VAL', 'IDENTIFIER', 'EOF', 'EOF']);
    });
  });

  describe('invariants', () => {
    const inputs = [
      'let val x = 1 in x + 2 end',
      "if a <> 'b' then ~1.5e3 else .25",
      'fun f (x : int) _ = &mut x && not y || z',
      '  while  i <= 10 do i := i * 2  ',
    ];

    it.each(inputs)('has non-decreasing starts and one EOF: %s', (input) => {
      const tokens = tokensOf(input);
      const starts = tokens.map((t) => t.span.start);
      expect(starts).toEqual([...starts].sort((a, b) => a - b));
      expect(tokens.filter((t) => t.value.type === TOKEN_TYPES.EOF)).toHaveLength(1);
      expect(tokens[tokens.length - 1]?.span).toEqual({
        src: 0,
        start: input.length,
        end: input.length,
      });
    });

    it.each(inputs)('spans fixed tokens over their lexeme: %s', (input) => {
      for (const token of tokensOf(input)) {
        const value = token.value;
        if (
          value.type === 'INT_LIT' ||
          value.type === 'REAL_LIT' ||
          value.type === 'BOOL_LIT' ||
          value.type === 'CHAR_LIT'
        ) {
          continue;
        }
        const text = input.slice(token.span.start, token.span.end);
        if (value.type === 'IDENTIFIER') {
          expect(text).toBe(value.value.text);
        } else {
          expect(text).toBe(tokenLexeme(value.type));
        }
      }
    });

    it.each(inputs)('is idempotent: %s', (input) => {
      expect(lex(0, input)).toEqual(lex(0, input));
    });
  });
});
