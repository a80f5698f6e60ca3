/**
 * Vocabulary Lookup Tables
 */

import type { EnclosureKind } from '../token-types.js';

/** Structural keywords of the modeling language */
export const KEYWORDS: ReadonlySet<string> = new Set([
  'type',
  'array',
  'var',
  'const',
  'init',
  'unsafe',
  'invariant',
  'number_procs',
  'transition',
  'requires',
  'forall_other',
  'case',
]);

export const TYPE_NAMES: ReadonlySet<string> = new Set([
  'bool',
  'real',
  'int',
  'proc',
]);

export const BOOLEAN_LITERALS: ReadonlySet<string> = new Set([
  'True',
  'False',
]);

/** Words flagged inside comments */
export const COMMENT_MARKERS: ReadonlySet<string> = new Set([
  'TODO',
  'FIXME',
  'XXX',
  'NOTE',
]);

/** Operators, longest first so := wins over : and || over | */
export const OPERATORS: readonly string[] = [':=', '&&', '||', '<', '>', '='];

export const KEY_CHARS: ReadonlySet<string> = new Set(['|', ';', ':', '.', '@']);

export const COMMENT_OPEN = '(*';
export const COMMENT_CLOSE = '*)';
export const SHEBANG = '#!';

export const ENCLOSURE_OPENERS: Readonly<Record<string, EnclosureKind>> = {
  '(': 'paren',
  '{': 'brace',
  '[': 'bracket',
};

export const ENCLOSURE_CLOSERS: Readonly<Record<string, EnclosureKind>> = {
  ')': 'paren',
  '}': 'brace',
  ']': 'bracket',
};
