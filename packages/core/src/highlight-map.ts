import type { Category } from './token-types.js';

// ============================================================
// PRESENTATION GROUPS
// ============================================================

/**
 * Host-side presentation groups. Names follow the standard editor
 * highlight groups so hosts can reuse their color schemes.
 */
export type HighlightGroup =
  | 'Error'
  | 'Comment'
  | 'Todo'
  | 'Statement'
  | 'Type'
  | 'Boolean'
  | 'Identifier'
  | 'Operator'
  | 'SpecialChar'
  | 'Delimiter'
  | 'Number'
  | 'Float';

export const HIGHLIGHT_GROUPS: readonly HighlightGroup[] = [
  'Error',
  'Comment',
  'Todo',
  'Statement',
  'Type',
  'Boolean',
  'Identifier',
  'Operator',
  'SpecialChar',
  'Delimiter',
  'Number',
  'Float',
];

export function isHighlightGroup(value: unknown): value is HighlightGroup {
  return HIGHLIGHT_GROUPS.some((group) => group === value);
}

// ============================================================
// CATEGORY GROUP MAP
// ============================================================

export const CATEGORY_GROUP_MAP: ReadonlyMap<Category, HighlightGroup> =
  new Map<Category, HighlightGroup>([
    ['error', 'Error'],
    ['comment', 'Comment'],
    ['todo', 'Todo'],

    // Keywords and delimiters of enclosures share the statement color
    ['keyword', 'Statement'],
    ['enclosure', 'Statement'],

    ['type', 'Type'],
    ['boolean', 'Boolean'],
    ['stateVariable', 'Identifier'],
    ['operator', 'Operator'],
    ['symbol', 'SpecialChar'],
    ['keyChar', 'Delimiter'],
    ['number', 'Number'],
    ['float', 'Float'],

    // Intentionally unmapped: identifier (rendered as plain text)
  ]);

export function presentationGroup(
  category: Category
): HighlightGroup | undefined {
  return CATEGORY_GROUP_MAP.get(category);
}
