/**
 * Kestrel Syntax
 * Exports spans, tokens, lexer, parser, AST types and diagnostics
 */

export {
  createSpan,
  formatSpan,
  isEmptySpan,
  joinSpans,
  mapSpanned,
  type SourceId,
  type SourceSpan,
  type Span,
  spanLength,
  spanned,
  type Spanned,
  spannedEquals,
  spansEqual,
  toSourceSpan,
  withSpan,
} from './source-span.js';
export { Ident, internedCount } from './intern.js';
export {
  describeToken,
  describeTokenType,
  type FixedTokenType,
  type PayloadTokenType,
  type SpannedToken,
  type Token,
  TOKEN_TYPES,
  tokenLexeme,
  type TokenType,
} from './token-types.js';
export {
  createLexerState,
  KEYWORDS,
  lex,
  LexerError,
  type LexerState,
  type LexErrorKind,
  type LexResult,
  MAX_INT_LITERAL,
  nextToken,
} from './lexer/index.js';
export {
  createParserState,
  MAX_NESTING_DEPTH,
  parseDeclaration,
  parseExpression,
  type ParseMode,
  Parser,
  type ParseResult,
  type ParserState,
  parseProgram,
  parseSource,
  type SourceResult,
} from './parser/index.js';
export type {
  ApplyNode,
  AssignStmtNode,
  BinaryExprNode,
  BinaryOp,
  BorrowKind,
  BorrowNode,
  DeclNode,
  ExprNode,
  FuncDeclNode,
  FuncNode,
  IdentParamNode,
  IfNode,
  LetNode,
  LiteralNode,
  LiteralValue,
  LocalNode,
  ParamNode,
  PrimType,
  StmtNode,
  TypedParamNode,
  UnaryExprNode,
  UnaryOp,
  ValBinding,
  ValDeclNode,
  ValStmtNode,
  WhileStmtNode,
  WildcardParamNode,
} from './ast-nodes.js';
export { formatType } from './ast-nodes.js';
export {
  collectSpans,
  formatDecl,
  formatExpr,
  formatLiteral,
  formatParam,
  formatStmt,
} from './ast-printer.js';
export {
  type Diagnostic,
  type DiagnosticLabel,
  KestrelError,
  type KestrelErrorData,
  ParseError,
  type ParseErrorKind,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type ErrorSeverity,
  renderMessage,
} from './error-registry.js';
export { type HighlightCategory, TOKEN_HIGHLIGHT_MAP } from './highlight-map.js';
