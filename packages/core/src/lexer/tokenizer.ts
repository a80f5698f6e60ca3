/**
 * Tokenizer
 * Steps the scanner through the rule table
 */

import type { Token } from '../token-types.js';
import { readUnclassified, readWhitespace } from './readers.js';
import { rulesForScope } from './rules.js';
import {
  createScannerState,
  inComment,
  isAtEnd,
  type ScannerCheckpoint,
  type ScannerState,
} from './state.js';

const CODE_RULES = rulesForScope('code');
const COMMENT_RULES = rulesForScope('comment');

/**
 * Read the next token, or null at end of input.
 * Tokens never span a line start.
 */
export function nextToken(state: ScannerState): Token | null {
  if (isAtEnd(state)) {
    return null;
  }

  if (inComment(state)) {
    for (const rule of COMMENT_RULES) {
      const token = rule.match(state);
      if (token !== null) return token;
    }
    // comment-text always consumes at least one character
    return readUnclassified(state);
  }

  const whitespace = readWhitespace(state);
  if (whitespace !== null) {
    return whitespace;
  }

  for (const rule of CODE_RULES) {
    const token = rule.match(state);
    if (token !== null) return token;
  }

  return readUnclassified(state);
}

export interface TokenizeOptions {
  /** Keep whitespace and unclassified text (category null) */
  includePlain?: boolean;
  /** Resume from a saved scanner position */
  checkpoint?: ScannerCheckpoint;
}

export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const state = createScannerState(source, options?.checkpoint);
  const tokens: Token[] = [];

  let token = nextToken(state);
  while (token !== null) {
    tokens.push(token);
    token = nextToken(state);
  }

  if (options?.includePlain !== true) {
    return tokens.filter((t) => t.category !== null);
  }

  return tokens;
}
