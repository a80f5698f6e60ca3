/**
 * Scanner Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation } from '../source-location.js';
import type { Category, RegionEvent, Token } from '../token-types.js';
import { advance, currentLocation, type ScannerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isLower(ch: string): boolean {
  return ch >= 'a' && ch <= 'z';
}

export function isUpper(ch: string): boolean {
  return ch >= 'A' && ch <= 'Z';
}

/** Characters that make up a whole word for keyword and boundary checks */
export function isWordChar(ch: string): boolean {
  return isLower(ch) || isUpper(ch) || isDigit(ch) || ch === '_';
}

/** Lowercase identifiers may also contain @ and . */
export function isIdentifierChar(ch: string): boolean {
  return isWordChar(ch) || ch === '@' || ch === '.';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function makeToken(
  category: Category | null,
  value: string,
  start: SourceLocation,
  end: SourceLocation,
  region?: RegionEvent
): Token {
  return region === undefined
    ? { category, value, span: { start, end } }
    : { category, value, span: { start, end }, region };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: ScannerState,
  n: number,
  category: Category | null,
  start: SourceLocation,
  region?: RegionEvent
): Token {
  const value = state.source.slice(state.pos, state.pos + n);
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(category, value, start, currentLocation(state), region);
}

/** Length of the word starting at the current position (0 if none) */
export function wordLengthAt(state: ScannerState): number {
  let end = state.pos;
  while (end < state.source.length && isWordChar(state.source[end] ?? '')) {
    end++;
  }
  return end - state.pos;
}

/** True when the current position is not preceded by a word character */
export function atWordStart(state: ScannerState): boolean {
  return !isWordChar(state.source[state.pos - 1] ?? '');
}
