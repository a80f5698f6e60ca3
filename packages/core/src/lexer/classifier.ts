/**
 * Classifier
 * Builds nested classified spans from the token stream
 */

import { createError } from '../error-classes.js';
import {
  locationWithin,
  spanOverlaps,
  type SourceLocation,
  type TextRange,
} from '../source-location.js';
import type { ClassifiedSpan, Token } from '../token-types.js';
import { nextToken } from './tokenizer.js';
import {
  commentDepth,
  createScannerState,
  currentLocation,
  inComment,
  saveCheckpoint,
  type ScannerCheckpoint,
  type ScannerState,
} from './state.js';

export interface ClassifyOptions {
  /** Only report spans overlapping this range. Spans are never clipped. */
  range?: TextRange;
  /** Resume from a saved scanner position at or before range.from */
  checkpoint?: ScannerCheckpoint;
}

/** Hooks used by incremental sessions */
export interface ScanHooks {
  /** Called at every line start the scan passes */
  onLineStart?: (checkpoint: ScannerCheckpoint) => void;
}

/**
 * Classify source text into spans ordered by start offset, enclosing
 * spans before the spans they contain.
 *
 * @throws HighlightError HL-R001 when the range lies outside the source
 */
export function classify(
  source: string,
  options?: ClassifyOptions
): ClassifiedSpan[] {
  return scanSpans(source, options ?? {}, {});
}

export function scanSpans(
  source: string,
  options: ClassifyOptions,
  hooks: ScanHooks
): ClassifiedSpan[] {
  const range = options.range;
  if (range !== undefined) {
    validateRange(source, range);
  }

  const state = createScannerState(source, options.checkpoint);
  const spans: ClassifiedSpan[] = [];

  // An empty range still asks for the character at its position
  const limit =
    range === undefined
      ? source.length
      : range.from === range.to
        ? Math.min(range.from + 1, source.length)
        : range.to;

  // Open comment regions must run to their close (or end of input)
  while (state.pos < limit || inComment(state)) {
    if (state.column === 1) {
      hooks.onLineStart?.(saveCheckpoint(state));
    }

    const wasInComment = inComment(state);
    const token = nextToken(state);
    if (token === null) break;

    collect(state, token, wasInComment, spans);
  }

  closeOpenComments(state, spans);

  const visible =
    range === undefined ? spans : spans.filter((s) => spanOverlaps(s.span, range));
  return visible.sort(compareSpans);
}

// ============================================================
// HELPERS
// ============================================================

function collect(
  state: ScannerState,
  token: Token,
  wasInComment: boolean,
  spans: ClassifiedSpan[]
): void {
  if (token.category === null) return;

  const region = token.region;
  if (region?.kind === 'comment') {
    // The delimiters belong to the region span, emitted whole on close
    if (region.action === 'close') {
      spans.push(
        regionSpan(state.source, region.open, token.span.end, commentDepth(state))
      );
    }
    return;
  }

  if (wasInComment && token.category === 'comment') {
    return;
  }

  spans.push({
    category: token.category,
    value: token.value,
    span: token.span,
    depth: commentDepth(state),
  });
}

/** Unterminated comments extend to the end of the input */
function closeOpenComments(state: ScannerState, spans: ClassifiedSpan[]): void {
  const end = currentLocation(state);
  let depth = 0;
  for (const frame of state.scopes) {
    if (frame.kind !== 'comment') continue;
    spans.push(regionSpan(state.source, frame.open, end, depth));
    depth++;
  }
}

function regionSpan(
  source: string,
  start: SourceLocation,
  end: SourceLocation,
  depth: number
): ClassifiedSpan {
  return {
    category: 'comment',
    value: source.slice(start.offset, end.offset),
    span: { start, end },
    depth,
  };
}

function compareSpans(a: ClassifiedSpan, b: ClassifiedSpan): number {
  if (a.span.start.offset !== b.span.start.offset) {
    return a.span.start.offset - b.span.start.offset;
  }
  if (a.span.end.offset !== b.span.end.offset) {
    return b.span.end.offset - a.span.end.offset;
  }
  return a.depth - b.depth;
}

export function validateRange(source: string, range: TextRange): void {
  if (
    !Number.isInteger(range.from) ||
    !Number.isInteger(range.to) ||
    range.from < 0 ||
    range.from > range.to ||
    range.to > source.length
  ) {
    throw createError(
      'HL-R001',
      { from: range.from, to: range.to, length: source.length },
      locationWithin(source, range.from)
    );
  }
}
