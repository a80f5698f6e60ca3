import type { SourceLocation, SourceSpan } from './source-location.js';

// ============================================================
// CATEGORIES
// ============================================================

export const CATEGORIES = {
  ERROR: 'error', // unbalanced delimiter or stray *)
  COMMENT: 'comment', // (* ... *) and #! header lines
  TODO: 'todo', // TODO / FIXME / XXX / NOTE inside comments

  // Words
  KEYWORD: 'keyword',
  TYPE: 'type', // bool, real, int, proc
  BOOLEAN: 'boolean', // True, False
  IDENTIFIER: 'identifier', // lowercase-leading
  STATE_VARIABLE: 'stateVariable', // uppercase-leading

  // Punctuation
  OPERATOR: 'operator', // := && || < > =
  SYMBOL: 'symbol', // _ ?
  KEY_CHAR: 'keyChar', // | ; : . @
  ENCLOSURE: 'enclosure', // ( ) { } [ ] when balanced

  // Literals
  NUMBER: 'number',
  FLOAT: 'float',
} as const;

export type Category = (typeof CATEGORIES)[keyof typeof CATEGORIES];

export const ALL_CATEGORIES: readonly Category[] = Object.values(CATEGORIES);

// ============================================================
// REGIONS
// ============================================================

export type EnclosureKind = 'paren' | 'brace' | 'bracket';

export type RegionKind = EnclosureKind | 'comment';

export interface RegionEvent {
  readonly action: 'open' | 'close';
  readonly kind: RegionKind;
  /** Where the region's opening delimiter starts */
  readonly open: SourceLocation;
}

// ============================================================
// TOKENS AND SPANS
// ============================================================

/**
 * Flat lexical unit produced by one scanner step.
 * `category` is null for text no rule classifies.
 */
export interface Token {
  readonly category: Category | null;
  readonly value: string;
  readonly span: SourceSpan;
  readonly region?: RegionEvent | undefined;
}

/**
 * Classified span. Spans are disjoint or nested, never partially
 * overlapping; `depth` counts the comment regions enclosing the span.
 */
export interface ClassifiedSpan {
  readonly category: Category;
  readonly value: string;
  readonly span: SourceSpan;
  readonly depth: number;
}
