// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  /** Exclusive */
  readonly end: SourceLocation;
}

/** Half-open offset range [from, to) */
export interface TextRange {
  readonly from: number;
  readonly to: number;
}

/** Line and column of an offset, counting UTF-16 units per column */
export function locationAt(source: string, offset: number): SourceLocation {
  const before = source.slice(0, offset);
  const lineStart = before.lastIndexOf('\n') + 1;
  return {
    line: before.split('\n').length,
    column: offset - lineStart + 1,
    offset,
  };
}

/** Location of an offset that lies within the source, else undefined */
export function locationWithin(
  source: string,
  offset: number
): SourceLocation | undefined {
  return Number.isInteger(offset) && offset >= 0 && offset <= source.length
    ? locationAt(source, offset)
    : undefined;
}

/**
 * True when the span intersects the range. An empty range intersects
 * the spans covering the character at its position.
 */
export function spanOverlaps(span: SourceSpan, range: TextRange): boolean {
  if (range.from === range.to) {
    return span.start.offset <= range.from && span.end.offset > range.from;
  }
  return span.start.offset < range.to && span.end.offset > range.from;
}
