/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 *
 * Methods are organized across multiple files:
 * - parser-expr.ts: Precedence chain, unary and borrow prefixes
 * - parser-literals.ts: Primaries, literals, grouping, types
 * - parser-control.ts: let, if and statements
 * - parser-decls.ts: Declarations, parameters, programs
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const expr = parser.parseExpressionInput();
 * ```
 */

import type { SpannedToken } from '../token-types.js';
import { type ParserState, createParserState } from './state.js';

export class Parser {
  /** Parser state including tokens and cursor position */
  state: ParserState;

  constructor(tokens: readonly SpannedToken[]) {
    this.state = createParserState(tokens);
  }
}
