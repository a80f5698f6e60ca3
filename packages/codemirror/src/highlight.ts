/**
 * Syntax Highlighter Module
 *
 * Implements StreamParser for Cubicle syntax highlighting in CodeMirror.
 * Each call reads one token with the cubicle-highlight scanner. The scope
 * stack is kept in the parser state, so comments spanning several lines
 * stay highlighted as comments.
 */

import type { StreamParser } from '@codemirror/language';
import { tags, type Tag } from '@lezer/highlight';
import {
  createScannerState,
  nextToken,
  type Category,
  type ScopeFrame,
  type Token,
} from 'cubicle-highlight';

// ============================================================
// CATEGORY TO TAG MAPPING
// ============================================================

/**
 * Maps categories to @lezer/highlight tags. Identifiers stay plain.
 */
export const CATEGORY_TAG_MAP: ReadonlyMap<Category, Tag> = new Map<
  Category,
  Tag
>([
  ['error', tags.invalid],
  ['comment', tags.comment],
  ['todo', tags.annotation],
  ['keyword', tags.keyword],
  ['enclosure', tags.keyword],
  ['type', tags.typeName],
  ['boolean', tags.bool],
  ['stateVariable', tags.variableName],
  ['operator', tags.operator],
  ['symbol', tags.atom],
  ['keyChar', tags.punctuation],
  ['number', tags.integer],
  ['float', tags.float],
]);

// ============================================================
// STREAM PARSER STATE
// ============================================================

export interface CubicleHighlightState {
  /** Regions open at the current position, outermost first */
  scopes: ScopeFrame[];
}

/**
 * Token name for CodeMirror, resolved through the tokenTable
 */
function tokenName(token: Token): string | null {
  if (token.category === null || !CATEGORY_TAG_MAP.has(token.category)) {
    return null;
  }
  return token.category;
}

// ============================================================
// STREAM PARSER IMPLEMENTATION
// ============================================================

/**
 * StreamParser for Cubicle syntax highlighting
 *
 * Usage:
 * ```typescript
 * import { StreamLanguage } from '@codemirror/language';
 * import { cubicleHighlighter } from 'cubicle-highlight-codemirror';
 *
 * const cubicleLanguage = StreamLanguage.define(cubicleHighlighter);
 * ```
 */
export const cubicleHighlighter = {
  name: 'cubicle',

  startState(): CubicleHighlightState {
    return { scopes: [] };
  },

  /**
   * Read one token from the line and return its name
   */
  token(stream, state): string | null {
    // Locations are line-relative; only the stack carries over
    const scanner = createScannerState(stream.string, {
      offset: stream.pos,
      line: 1,
      column: stream.pos + 1,
      scopes: state.scopes,
    });

    const token = nextToken(scanner);
    if (token === null) {
      stream.skipToEnd();
      return null;
    }

    stream.pos = scanner.pos;
    state.scopes = scanner.scopes;
    return tokenName(token);
  },

  copyState(state): CubicleHighlightState {
    return { scopes: [...state.scopes] };
  },

  tokenTable: Object.fromEntries(CATEGORY_TAG_MAP),

  languageData: {
    commentTokens: { block: { open: '(*', close: '*)' } },
  },
} satisfies StreamParser<CubicleHighlightState>;
