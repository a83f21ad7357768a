/**
 * Kestrel Error Registry Tests
 * Registry contents and template rendering
 */

import { describe, expect, it } from 'vitest';
import { ERROR_REGISTRY, renderMessage } from '../../src/index.js';

describe('ERROR_REGISTRY', () => {
  it('holds eight lexer and seven parser errors', () => {
    const ids = [...ERROR_REGISTRY.entries()].map(([id]) => id);
    expect(ids.filter((id) => id.startsWith('lex::'))).toHaveLength(8);
    expect(ids.filter((id) => id.startsWith('parse::'))).toHaveLength(7);
    expect(ERROR_REGISTRY.size).toBe(15);
  });

  it('files every id under the category its prefix names', () => {
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.errorId).toBe(id);
      expect(definition.category).toBe(id.startsWith('lex::') ? 'lexer' : 'parse');
    }
  });

  it('returns undefined for unknown ids', () => {
    expect(ERROR_REGISTRY.get('lex::nope')).toBeUndefined();
    expect(ERROR_REGISTRY.has('lex::nope')).toBe(false);
  });

  it('gives every definition a description and a label', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.description.length).toBeGreaterThan(0);
      expect(definition.label.length).toBeGreaterThan(0);
    }
  });
});

describe('renderMessage', () => {
  it('fills placeholders from the context', () => {
    expect(
      renderMessage('expected {expected}, found {found}', {
        expected: "')'",
        found: 'end of input',
      })
    ).toBe("expected ')', found end of input");
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('a{missing}b', {})).toBe('ab');
  });

  it('coerces non-string values', () => {
    expect(renderMessage('{n} and {b}', { n: 3, b: false })).toBe('3 and false');
  });

  it('returns the template unchanged when a brace is unclosed', () => {
    expect(renderMessage('value {oops', { oops: 1 })).toBe('value {oops');
  });
});
