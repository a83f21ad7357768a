/**
 * CLI Error Formatter
 * Format diagnostics for human-readable or JSON output
 */

import type { Diagnostic } from './error-classes.js';
import type { Span } from './source-span.js';
import { lineAt, offsetToPosition } from './cli-shared.js';
import { toLspDiagnostic } from './cli-lsp-diagnostic.js';

export type DiagnosticFormat = 'human' | 'json';

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format a diagnostic against the source text it points into.
 *
 * Only the label spans and `source` are consulted; no other location
 * data is needed.
 *
 * @throws {TypeError} Unknown format
 */
export function formatDiagnostic(
  diagnostic: Diagnostic,
  source: string,
  file: string,
  format: DiagnosticFormat
): string {
  switch (format) {
    case 'human':
      return formatDiagnosticHuman(diagnostic, source, file);
    case 'json':
      return JSON.stringify(toLspDiagnostic(diagnostic, source, file), null, 2);
    default:
      throw new TypeError(`Unknown format: ${String(format)}`);
  }
}

/**
 * Format a diagnostic in human-readable form.
 *
 * Output format:
 * ```
 * error[parse::expected_delimiter]: expected ')' to close '('
 *   --> main.kes:1:7
 *    |
 *  1 | (1 + 2
 *    |       ^ expected ')'
 *  1 | (1 + 2
 *    | - unclosed '(' opened here
 *    |
 *    = help: add ')' to match the opening '('
 * ```
 * The first label is underlined with `^`, later labels with `-`.
 */
function formatDiagnosticHuman(
  diagnostic: Diagnostic,
  source: string,
  file: string
): string {
  const lines: string[] = [];
  lines.push(`${diagnostic.severity}[${diagnostic.code}]: ${diagnostic.message}`);

  const located = diagnostic.labels.map((label, index) => ({
    label,
    position: offsetToPosition(source, label.span.start),
    marker: index === 0 ? '^' : '-',
  }));

  const lineNumberWidth = String(
    Math.max(1, ...located.map((l) => l.position.line))
  ).length;
  const padding = ' '.repeat(lineNumberWidth + 2);
  const gutter = `${padding}|`;

  const [primary] = located;
  if (primary) {
    lines.push(`  --> ${file}:${primary.position.line}:${primary.position.column}`);
    lines.push(gutter);
    for (const { label, position, marker } of located) {
      const content = lineAt(source, position.line);
      const lineNumStr = String(position.line).padStart(lineNumberWidth, ' ');
      lines.push(` ${lineNumStr} | ${content}`);
      const underline = renderUnderline(label.span, position.column, content, marker);
      lines.push(`${gutter} ${underline} ${label.message}`);
    }
    lines.push(gutter);
  }

  if (diagnostic.help !== undefined) {
    lines.push(`${padding}= help: ${diagnostic.help}`);
  }

  return lines.join('\n');
}

/**
 * Underline a span on its first line. Empty spans and spans past the end
 * of the line still get one marker.
 */
function renderUnderline(
  span: Span,
  column: number,
  content: string,
  marker: string
): string {
  const indent = column - 1;
  const available = content.length - indent;
  const width = Math.max(1, Math.min(span.end - span.start, available));
  return ' '.repeat(indent) + marker.repeat(width);
}
