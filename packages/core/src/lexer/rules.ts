/**
 * Scan Rules
 * Priority-ordered rule table. At each position the first rule of the
 * active scope that matches wins. Region rules push and pop scope
 * frames; comment scope only admits the comment rules.
 */

import { CATEGORIES, type Token } from '../token-types.js';
import {
  advanceAndMakeToken,
  atWordStart,
  wordLengthAt,
} from './helpers.js';
import {
  readCommentText,
  readIdentifier,
  readNumber,
  readShebang,
  readStateVariable,
} from './readers.js';
import {
  currentLocation,
  peek,
  peekString,
  topScope,
  type ScannerState,
} from './state.js';
import {
  BOOLEAN_LITERALS,
  COMMENT_CLOSE,
  COMMENT_MARKERS,
  COMMENT_OPEN,
  ENCLOSURE_CLOSERS,
  ENCLOSURE_OPENERS,
  KEY_CHARS,
  KEYWORDS,
  OPERATORS,
  SHEBANG,
  TYPE_NAMES,
} from './vocabulary.js';
import type { Category } from '../token-types.js';

export type RuleScope = 'code' | 'comment';

export interface ScanRule {
  readonly name: string;
  readonly scope: RuleScope;
  /**
   * Consume and return a token, or return null without moving.
   */
  match(state: ScannerState): Token | null;
}

// ============================================================
// RULE BUILDERS
// ============================================================

/** Whole-word lookup against a fixed word set */
function wordRule(
  name: string,
  scope: RuleScope,
  words: ReadonlySet<string>,
  category: Category
): ScanRule {
  return {
    name,
    scope,
    match(state) {
      if (!atWordStart(state)) return null;
      const length = wordLengthAt(state);
      if (length === 0) return null;
      const word = state.source.slice(state.pos, state.pos + length);
      if (!words.has(word)) return null;
      return advanceAndMakeToken(state, length, category, currentLocation(state));
    },
  };
}

function readerRule(
  name: string,
  read: (state: ScannerState) => Token | null
): ScanRule {
  return { name, scope: 'code', match: read };
}

// ============================================================
// CODE SCOPE
// ============================================================

const shebang: ScanRule = {
  name: 'shebang',
  scope: 'code',
  match(state) {
    if (state.column !== 1 || peekString(state, 2) !== SHEBANG) return null;
    return readShebang(state);
  },
};

const enclosureClose: ScanRule = {
  name: 'enclosure-close',
  scope: 'code',
  match(state) {
    const kind = ENCLOSURE_CLOSERS[peek(state)];
    const top = topScope(state);
    if (kind === undefined || top?.kind !== kind) return null;

    state.scopes.pop();
    return advanceAndMakeToken(
      state,
      1,
      CATEGORIES.ENCLOSURE,
      currentLocation(state),
      { action: 'close', kind, open: top.open }
    );
  },
};

const unmatchedClose: ScanRule = {
  name: 'unmatched-close',
  scope: 'code',
  match(state) {
    if (ENCLOSURE_CLOSERS[peek(state)] === undefined) return null;
    return advanceAndMakeToken(state, 1, CATEGORIES.ERROR, currentLocation(state));
  },
};

const strayCommentClose: ScanRule = {
  name: 'stray-comment-close',
  scope: 'code',
  match(state) {
    if (peekString(state, 2) !== COMMENT_CLOSE) return null;
    return advanceAndMakeToken(state, 2, CATEGORIES.ERROR, currentLocation(state));
  },
};

function commentOpenRule(scope: RuleScope): ScanRule {
  return {
    name: scope === 'code' ? 'comment-open' : 'nested-comment-open',
    scope,
    match(state) {
      if (peekString(state, 2) !== COMMENT_OPEN) return null;
      const open = currentLocation(state);
      state.scopes.push({ kind: 'comment', open });
      return advanceAndMakeToken(state, 2, CATEGORIES.COMMENT, open, {
        action: 'open',
        kind: 'comment',
        open,
      });
    },
  };
}

const enclosureOpen: ScanRule = {
  name: 'enclosure-open',
  scope: 'code',
  match(state) {
    const kind = ENCLOSURE_OPENERS[peek(state)];
    if (kind === undefined) return null;
    const open = currentLocation(state);
    state.scopes.push({ kind, open });
    return advanceAndMakeToken(state, 1, CATEGORIES.ENCLOSURE, open, {
      action: 'open',
      kind,
      open,
    });
  },
};

const operator: ScanRule = {
  name: 'operator',
  scope: 'code',
  match(state) {
    for (const op of OPERATORS) {
      if (peekString(state, op.length) === op) {
        return advanceAndMakeToken(
          state,
          op.length,
          CATEGORIES.OPERATOR,
          currentLocation(state)
        );
      }
    }
    return null;
  },
};

const symbol: ScanRule = {
  name: 'symbol',
  scope: 'code',
  match(state) {
    const ch = peek(state);
    const standaloneUnderscore =
      ch === '_' && atWordStart(state) && wordLengthAt(state) === 1;
    if (ch !== '?' && !standaloneUnderscore) return null;
    return advanceAndMakeToken(state, 1, CATEGORIES.SYMBOL, currentLocation(state));
  },
};

const keyChar: ScanRule = {
  name: 'key-char',
  scope: 'code',
  match(state) {
    if (!KEY_CHARS.has(peek(state))) return null;
    return advanceAndMakeToken(
      state,
      1,
      CATEGORIES.KEY_CHAR,
      currentLocation(state)
    );
  },
};

// ============================================================
// COMMENT SCOPE
// ============================================================

const commentClose: ScanRule = {
  name: 'comment-close',
  scope: 'comment',
  match(state) {
    const top = topScope(state);
    if (peekString(state, 2) !== COMMENT_CLOSE || top?.kind !== 'comment') {
      return null;
    }
    state.scopes.pop();
    return advanceAndMakeToken(state, 2, CATEGORIES.COMMENT, currentLocation(state), {
      action: 'close',
      kind: 'comment',
      open: top.open,
    });
  },
};

const commentText: ScanRule = {
  name: 'comment-text',
  scope: 'comment',
  match: readCommentText,
};

// ============================================================
// RULE TABLE
// ============================================================

/**
 * Rule table in priority order. Defined once; never mutated.
 */
export const SCAN_RULES: readonly ScanRule[] = [
  // Code scope
  shebang,
  enclosureClose,
  unmatchedClose,
  strayCommentClose,
  commentOpenRule('code'),
  enclosureOpen,
  wordRule('keyword', 'code', KEYWORDS, CATEGORIES.KEYWORD),
  wordRule('type', 'code', TYPE_NAMES, CATEGORIES.TYPE),
  wordRule('boolean', 'code', BOOLEAN_LITERALS, CATEGORIES.BOOLEAN),
  readerRule('identifier', readIdentifier),
  operator,
  symbol,
  readerRule('state-variable', readStateVariable),
  keyChar,
  readerRule('number', readNumber),

  // Comment scope
  commentClose,
  commentOpenRule('comment'),
  wordRule('comment-marker', 'comment', COMMENT_MARKERS, CATEGORIES.TODO),
  commentText,
];

export function rulesForScope(scope: RuleScope): readonly ScanRule[] {
  return SCAN_RULES.filter((rule) => rule.scope === scope);
}
