/**
 * Token Readers
 * Functions to read specific token shapes from source
 */

import { CATEGORIES, type Token } from '../token-types.js';
import {
  atWordStart,
  isDigit,
  isIdentifierChar,
  isLower,
  isUpper,
  isWhitespace,
  isWordChar,
  makeToken,
  wordLengthAt,
  advanceAndMakeToken,
} from './helpers.js';
import { COMMENT_CLOSE, COMMENT_MARKERS, COMMENT_OPEN } from './vocabulary.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  peek,
  peekString,
  type ScannerState,
} from './state.js';

const FLOAT_PATTERN = /-?\d[\d_]*(\.[\d_]*)?([eE][-+]?\d[\d_]*)?/y;
const INTEGER_PATTERN = /-?\d[\d_]*[lLn]?/y;

function matchAt(pattern: RegExp, state: ScannerState): RegExpExecArray | null {
  pattern.lastIndex = state.pos;
  return pattern.exec(state.source);
}

/** A literal must not run into the following word */
function endsAtBoundary(state: ScannerState, length: number): boolean {
  return !isWordChar(peek(state, length));
}

/**
 * Read an optionally signed integer or float literal.
 * Floats need a fraction or an exponent; integers may carry a
 * size suffix (l, L, n). Returns null when no literal starts here.
 */
export function readNumber(state: ScannerState): Token | null {
  const ch = peek(state);
  const signed = ch === '-' && isDigit(peek(state, 1));
  if (!signed && !isDigit(ch)) return null;
  if (!atWordStart(state)) return null;

  const start = currentLocation(state);

  const float = matchAt(FLOAT_PATTERN, state);
  if (
    float !== null &&
    (float[1] !== undefined || float[2] !== undefined) &&
    endsAtBoundary(state, float[0].length)
  ) {
    return advanceAndMakeToken(state, float[0].length, CATEGORIES.FLOAT, start);
  }

  const integer = matchAt(INTEGER_PATTERN, state);
  if (integer !== null && endsAtBoundary(state, integer[0].length)) {
    return advanceAndMakeToken(
      state,
      integer[0].length,
      CATEGORIES.NUMBER,
      start
    );
  }

  return null;
}

/** Lowercase-leading identifier: letters, digits, _, @ and . */
export function readIdentifier(state: ScannerState): Token | null {
  if (!isLower(peek(state)) || !atWordStart(state)) return null;

  let length = 1;
  while (isIdentifierChar(peek(state, length))) length++;

  return advanceAndMakeToken(
    state,
    length,
    CATEGORIES.IDENTIFIER,
    currentLocation(state)
  );
}

/** Uppercase-leading identifier naming a state variable */
export function readStateVariable(state: ScannerState): Token | null {
  if (!isUpper(peek(state)) || !atWordStart(state)) return null;

  return advanceAndMakeToken(
    state,
    wordLengthAt(state),
    CATEGORIES.STATE_VARIABLE,
    currentLocation(state)
  );
}

/** #! header up to (not including) the end of the line */
export function readShebang(state: ScannerState): Token {
  const start = currentLocation(state);
  let value = '';
  while (!isAtEnd(state) && peek(state) !== '\n') {
    value += advance(state);
  }
  return makeToken(CATEGORIES.COMMENT, value, start, currentLocation(state));
}

/**
 * Read comment text up to the next comment delimiter, flagged marker,
 * or line end. A chunk ends after the newline that terminates it so
 * every line start falls on a token boundary.
 */
export function readCommentText(state: ScannerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state)) {
    const pair = peekString(state, 2);
    if (value !== '' && (pair === COMMENT_OPEN || pair === COMMENT_CLOSE)) {
      break;
    }

    const wordLength = wordLengthAt(state);
    if (wordLength > 0) {
      const word = state.source.slice(state.pos, state.pos + wordLength);
      if (value !== '' && COMMENT_MARKERS.has(word)) break;
      for (let i = 0; i < wordLength; i++) value += advance(state);
      continue;
    }

    const ch = advance(state);
    value += ch;
    if (ch === '\n') break;
  }

  return makeToken(CATEGORIES.COMMENT, value, start, currentLocation(state));
}

/**
 * Whitespace within a line, or a single newline. Never crosses a line
 * start.
 */
export function readWhitespace(state: ScannerState): Token | null {
  if (!isWhitespace(peek(state))) return null;

  const start = currentLocation(state);
  if (peek(state) === '\n') {
    return advanceAndMakeToken(state, 1, null, start);
  }

  let length = 0;
  while (isWhitespace(peek(state, length)) && peek(state, length) !== '\n') {
    length++;
  }
  return advanceAndMakeToken(state, length, null, start);
}

/** Text no rule classifies: a whole word, or a single character */
export function readUnclassified(state: ScannerState): Token {
  const start = currentLocation(state);
  const wordLength = wordLengthAt(state);
  return advanceAndMakeToken(state, Math.max(wordLength, 1), null, start);
}
