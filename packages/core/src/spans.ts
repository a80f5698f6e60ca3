/**
 * Span Utilities
 * Helpers for hosts that render classified spans
 */

import type { SourceLocation } from './source-location.js';
import type { ClassifiedSpan } from './token-types.js';

interface OpenSpan {
  readonly span: ClassifiedSpan;
  cursor: SourceLocation;
}

/**
 * Flatten nested spans into non-overlapping segments. At every offset
 * the innermost span wins; an enclosing span is split around the spans
 * it contains.
 *
 * @example
 * // "(* TODO x *)" -> comment "(* ", todo "TODO", comment " x *)"
 */
export function flattenSpans(
  spans: readonly ClassifiedSpan[]
): ClassifiedSpan[] {
  const ordered = [...spans].sort(
    (a, b) =>
      a.span.start.offset - b.span.start.offset ||
      b.span.end.offset - a.span.end.offset ||
      a.depth - b.depth
  );

  const segments: ClassifiedSpan[] = [];
  const stack: OpenSpan[] = [];

  const closeUntil = (offset: number): void => {
    let top = stack[stack.length - 1];
    while (top !== undefined && top.span.span.end.offset <= offset) {
      pushSegment(segments, top.span, top.cursor, top.span.span.end);
      stack.pop();
      const parent = stack[stack.length - 1];
      if (parent !== undefined) {
        parent.cursor = top.span.span.end;
      }
      top = parent;
    }
  };

  for (const span of ordered) {
    closeUntil(span.span.start.offset);

    const parent = stack[stack.length - 1];
    if (parent !== undefined) {
      pushSegment(segments, parent.span, parent.cursor, span.span.start);
      parent.cursor = span.span.start;
    }
    stack.push({ span, cursor: span.span.start });
  }

  closeUntil(Number.POSITIVE_INFINITY);
  return segments;
}

function pushSegment(
  segments: ClassifiedSpan[],
  owner: ClassifiedSpan,
  from: SourceLocation,
  to: SourceLocation
): void {
  if (to.offset <= from.offset) return;

  const base = owner.span.start.offset;
  segments.push({
    category: owner.category,
    value: owner.value.slice(from.offset - base, to.offset - base),
    span: { start: from, end: to },
    depth: owner.depth,
  });
}

/** Innermost span covering an offset */
export function spanAt(
  spans: readonly ClassifiedSpan[],
  offset: number
): ClassifiedSpan | undefined {
  let found: ClassifiedSpan | undefined;
  for (const span of spans) {
    if (span.span.start.offset <= offset && offset < span.span.end.offset) {
      if (found === undefined || span.depth >= found.depth) {
        found = span;
      }
    }
  }
  return found;
}
