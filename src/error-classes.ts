/**
 * Kestrel Error Classes
 * Structured lexer and parser errors backed by the error registry
 */

import type { Span } from './source-span.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorSeverity,
} from './error-registry.js';

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/** A span with the text a renderer prints beside its caret line */
export interface DiagnosticLabel {
  readonly span: Span;
  readonly message: string;
}

/** Plain diagnostic record handed to renderers */
export interface Diagnostic {
  readonly code: string;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly help?: string | undefined;
  /** First label is the primary one */
  readonly labels: readonly DiagnosticLabel[];
}

/** Structured error data for host applications */
export interface KestrelErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly labels: readonly DiagnosticLabel[];
  readonly help?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/** @internal */
export function lookupDefinition(
  errorId: string,
  category: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Kestrel front-end errors.
 * Provides structured data for host applications to format as needed.
 */
export class KestrelError extends Error {
  readonly errorId: string;
  readonly help: string | undefined;
  readonly labels: readonly DiagnosticLabel[];
  readonly context: Record<string, unknown> | undefined;

  constructor(data: KestrelErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }
    if (data.labels.length === 0) {
      throw new TypeError('At least one labeled span is required');
    }

    super(data.message);
    this.name = 'KestrelError';
    this.errorId = data.errorId;
    this.help = data.help;
    this.labels = data.labels;
    this.context = data.context;
  }

  /** Span of the first label */
  get primarySpan(): Span {
    const [primary] = this.labels;
    if (!primary) {
      throw new TypeError('Error has no labeled span');
    }
    return primary.span;
  }

  get severity(): ErrorSeverity {
    return 'error';
  }

  /** Get structured error data for custom formatting */
  toData(): KestrelErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      labels: this.labels,
      help: this.help,
      context: this.context,
    };
  }

  toDiagnostic(): Diagnostic {
    return {
      code: this.errorId,
      severity: this.severity,
      message: this.message,
      help: this.help,
      labels: this.labels,
    };
  }
}

// ============================================================
// PARSE ERRORS
// ============================================================

export type ParseErrorKind =
  | {
      readonly kind: 'UnexpectedToken';
      readonly expected: string;
      readonly found: string;
      readonly span: Span;
      /** Replaces the registry help text when present */
      readonly hint?: string | undefined;
    }
  | { readonly kind: 'UnexpectedEOF'; readonly span: Span }
  | { readonly kind: 'ExpectedType'; readonly found: string; readonly span: Span }
  | {
      readonly kind: 'ExpectedPrimary';
      readonly found: string;
      readonly span: Span;
    }
  | {
      readonly kind: 'ExpectedDelimiter';
      readonly expected: string;
      readonly opened: string;
      readonly openSpan: Span;
      readonly endSpan: Span;
    }
  | {
      readonly kind: 'ExpectedLiteral';
      readonly found: string;
      readonly span: Span;
    }
  | {
      readonly kind: 'NestingTooDeep';
      readonly limit: number;
      readonly span: Span;
    };

const PARSE_ERROR_IDS: Record<ParseErrorKind['kind'], string> = {
  UnexpectedToken: 'parse::unexpected_token',
  UnexpectedEOF: 'parse::unexpected_eof',
  ExpectedType: 'parse::expected_type',
  ExpectedPrimary: 'parse::expected_primary',
  ExpectedDelimiter: 'parse::expected_delimiter',
  ExpectedLiteral: 'parse::expected_literal',
  NestingTooDeep: 'parse::nesting_too_deep',
};

function parseErrorLabels(
  kind: ParseErrorKind,
  primaryLabel: string
): DiagnosticLabel[] {
  if (kind.kind === 'ExpectedDelimiter') {
    return [
      { span: kind.endSpan, message: primaryLabel },
      { span: kind.openSpan, message: `unclosed '${kind.opened}' opened here` },
    ];
  }
  return [{ span: kind.span, message: primaryLabel }];
}

/** Syntax error; the parser stops at the first one */
export class ParseError extends KestrelError {
  readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind) {
    const errorId = PARSE_ERROR_IDS[kind.kind];
    const definition = lookupDefinition(errorId, 'parse');
    const context: Record<string, unknown> = { ...kind };
    const hint = kind.kind === 'UnexpectedToken' ? kind.hint : undefined;
    const help =
      hint ??
      (definition.help === undefined
        ? undefined
        : renderMessage(definition.help, context));

    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      labels: parseErrorLabels(kind, renderMessage(definition.label, context)),
      help,
      context,
    });

    this.name = 'ParseError';
    this.kind = kind;
  }
}
