/**
 * CLI Shared Utilities
 * Source positions, version lookup and host error formatting
 */

import { readFile } from 'node:fs/promises';

// ============================================================
// SOURCE POSITIONS
// ============================================================

/** 1-based line and column; columns count UTF-16 code units */
export interface SourcePosition {
  readonly line: number;
  readonly column: number;
}

/**
 * Convert an offset into a line/column position.
 * Offsets past the end clamp to the end of the source.
 */
export function offsetToPosition(
  source: string,
  offset: number
): SourcePosition {
  const clamped = Math.min(Math.max(offset, 0), source.length);
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (source.charAt(i) === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1 };
}

/** Text of a 1-based line without its terminator */
export function lineAt(source: string, line: number): string {
  const text = source.split('\n')[line - 1] ?? '';
  return text.endsWith('\r') ? text.slice(0, -1) : text;
}

// ============================================================
// HOST ERRORS
// ============================================================

/**
 * Format a file-system or usage error for stderr output
 */
export function formatError(err: unknown): string {
  if (err instanceof Error && 'code' in err && 'path' in err) {
    if (err.code === 'ENOENT') {
      return `File not found: ${String(err.path)}`;
    }
    if (err.code === 'EISDIR') {
      return `Path is a directory: ${String(err.path)}`;
    }
  }

  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

// ============================================================
// VERSION
// ============================================================

/**
 * Read the package version from package.json next to the build output.
 */
export async function readVersion(): Promise<string> {
  const content = await readFile(
    new URL('../package.json', import.meta.url),
    'utf-8'
  );
  const data: unknown = JSON.parse(content);
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  throw new Error('package.json has no version field');
}
