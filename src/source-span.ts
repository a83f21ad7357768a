// ============================================================
// SOURCE SPAN
// ============================================================

/**
 * Opaque handle naming one source file within a session.
 * Assigned by the host's source store; the front-end never interprets it.
 */
export type SourceId = number;

/**
 * Half-open range `[start, end)` within one named source.
 * Offsets index the source string as passed to the lexer, so they count
 * UTF-16 code units, not bytes. They differ from byte offsets only after
 * a non-ASCII character (inside a char literal or an invalid token);
 * hosts whose renderers take byte offsets must convert.
 */
export interface Span {
  readonly src: SourceId;
  readonly start: number;
  readonly end: number;
}

/** Renderer-friendly projection of a span */
export interface SourceSpan {
  readonly src: SourceId;
  readonly offset: number;
  readonly length: number;
}

function assertOffset(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`Span ${name} must be a non-negative integer`);
  }
}

/**
 * Create a span over `[start, end)` in `src`.
 *
 * @throws {RangeError} when a bound is negative or not an integer, or start > end
 */
export function createSpan(src: SourceId, start: number, end: number): Span {
  assertOffset('start', start);
  assertOffset('end', end);
  if (start > end) {
    throw new RangeError(`Invalid span: ${start}..${end}`);
  }
  return { src, start, end };
}

/**
 * Join two spans from the same source: minimum start, maximum end.
 *
 * @throws {TypeError} when the spans come from different sources
 */
export function joinSpans(a: Span, b: Span): Span {
  if (a.src !== b.src) {
    throw new TypeError(
      `Cannot join spans from different sources: ${a.src} and ${b.src}`
    );
  }
  return {
    src: a.src,
    start: Math.min(a.start, b.start),
    end: Math.max(a.end, b.end),
  };
}

export function spanLength(span: Span): number {
  return span.end - span.start;
}

export function isEmptySpan(span: Span): boolean {
  return span.start === span.end;
}

export function spansEqual(a: Span, b: Span): boolean {
  return a.src === b.src && a.start === b.start && a.end === b.end;
}

/** Project a span to the `(src, offset, length)` triple renderers consume */
export function toSourceSpan(span: Span): SourceSpan {
  return { src: span.src, offset: span.start, length: spanLength(span) };
}

export function formatSpan(span: Span): string {
  return `${span.src}:${span.start}..${span.end}`;
}

// ============================================================
// SPANNED VALUES
// ============================================================

/** A value paired with the span it was read from */
export interface Spanned<T> {
  readonly value: T;
  readonly span: Span;
}

export function spanned<T>(value: T, span: Span): Spanned<T> {
  return { value, span };
}

/** Replace the value, keeping the span */
export function mapSpanned<T, U>(
  node: Spanned<T>,
  fn: (value: T) => U
): Spanned<U> {
  return { value: fn(node.value), span: node.span };
}

/** Replace the span, keeping the value */
export function withSpan<T>(node: Spanned<T>, span: Span): Spanned<T> {
  return { value: node.value, span };
}

export function spannedEquals<T>(
  a: Spanned<T>,
  b: Spanned<T>,
  eq: (x: T, y: T) => boolean = Object.is
): boolean {
  return spansEqual(a.span, b.span) && eq(a.value, b.value);
}
