/**
 * Identifier Interning
 * Identifiers are canonicalised through a process-wide table so that
 * equality is a reference comparison.
 */

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Append-only; entries live for the rest of the process */
let table: Map<string, Ident> | undefined;

export class Ident {
  readonly text: string;

  private constructor(text: string) {
    this.text = text;
  }

  /**
   * Return the canonical identifier for `text`.
   *
   * @throws {TypeError} when `text` is not a valid identifier
   *
   * @example
   * Ident.intern('x') === Ident.intern('x') // true
   */
  static intern(text: string): Ident {
    table ??= new Map();
    const existing = table.get(text);
    if (existing) return existing;

    if (!IDENTIFIER_PATTERN.test(text)) {
      throw new TypeError(`Invalid identifier: '${text}'`);
    }

    const ident = new Ident(text);
    table.set(text, ident);
    return ident;
  }

  equals(other: Ident): boolean {
    return this === other;
  }

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}

export function internedCount(): number {
  return table?.size ?? 0;
}
