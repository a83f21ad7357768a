/**
 * CLI LSP Diagnostic Conversion
 * Convert Diagnostic records to LSP Diagnostic format
 */

import type { Diagnostic, DiagnosticLabel } from './error-classes.js';
import type { ErrorSeverity } from './error-registry.js';
import { offsetToPosition } from './cli-shared.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface LspDiagnostic {
  readonly range: LspRange;
  readonly severity: 1 | 2 | 3;
  readonly code: string;
  readonly source: 'kestrel';
  readonly message: string;
  readonly help?: string | undefined;
  readonly relatedInformation?: LspRelatedInformation[] | undefined;
}

export interface LspRelatedInformation {
  readonly location: { readonly uri: string; readonly range: LspRange };
  readonly message: string;
}

export interface LspRange {
  readonly start: LspPosition;
  readonly end: LspPosition;
}

export interface LspPosition {
  readonly line: number;
  readonly character: number;
}

// ============================================================
// LSP DIAGNOSTIC CONVERSION
// ============================================================

/**
 * Convert a Diagnostic to LSP Diagnostic format.
 *
 * LSP positions are zero-based. The first label supplies the range;
 * further labels become related information pointing into `file`.
 */
export function toLspDiagnostic(
  diagnostic: Diagnostic,
  source: string,
  file: string
): LspDiagnostic {
  const [primary, ...secondary] = diagnostic.labels;
  if (!primary) {
    throw new TypeError(`Diagnostic ${diagnostic.code} has no labeled span`);
  }

  const related = secondary.map((label) => ({
    location: { uri: file, range: labelRange(label, source) },
    message: label.message,
  }));

  return {
    range: labelRange(primary, source),
    severity: LSP_SEVERITY[diagnostic.severity],
    code: diagnostic.code,
    source: 'kestrel',
    message: diagnostic.message,
    ...(diagnostic.help !== undefined ? { help: diagnostic.help } : {}),
    ...(related.length > 0 ? { relatedInformation: related } : {}),
  };
}

function labelRange(label: DiagnosticLabel, source: string): LspRange {
  return {
    start: toLspPosition(source, label.span.start),
    end: toLspPosition(source, label.span.end),
  };
}

function toLspPosition(source: string, offset: number): LspPosition {
  const { line, column } = offsetToPosition(source, offset);
  return { line: line - 1, character: column - 1 };
}

/** LSP severity codes: Error=1, Warning=2, Information=3 */
const LSP_SEVERITY: Record<ErrorSeverity, 1 | 2 | 3> = {
  error: 1,
};
