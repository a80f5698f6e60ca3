/**
 * Cubicle Runtime Tests: Highlight Map Completeness
 * Tests for CATEGORY_GROUP_MAP completeness and validity
 */

import { describe, expect, it } from 'vitest';
import {
  ALL_CATEGORIES,
  CATEGORY_GROUP_MAP,
  isHighlightGroup,
  presentationGroup,
} from 'cubicle-highlight';

describe('Cubicle Runtime: Highlight Map Completeness', () => {
  it('maps every category except identifier', () => {
    for (const category of ALL_CATEGORIES) {
      expect(CATEGORY_GROUP_MAP.has(category), `Category ${category}`).toBe(
        category !== 'identifier'
      );
    }
    expect(CATEGORY_GROUP_MAP.size).toBe(ALL_CATEGORIES.length - 1);
  });

  it('maps only to known presentation groups', () => {
    for (const [category, group] of CATEGORY_GROUP_MAP.entries()) {
      expect(isHighlightGroup(group), `Category ${category}: ${group}`).toBe(
        true
      );
    }
  });

  it('shares the statement group between keywords and enclosures', () => {
    expect(presentationGroup('keyword')).toBe('Statement');
    expect(presentationGroup('enclosure')).toBe('Statement');
  });

  it('maps state variables to the identifier group', () => {
    expect(presentationGroup('stateVariable')).toBe('Identifier');
    expect(presentationGroup('symbol')).toBe('SpecialChar');
    expect(presentationGroup('keyChar')).toBe('Delimiter');
  });

  it('rejects unknown group names', () => {
    expect(isHighlightGroup('Keyword')).toBe(false);
    expect(isHighlightGroup(3)).toBe(false);
  });

  it('returns undefined for plain identifiers', () => {
    expect(presentationGroup('identifier')).toBeUndefined();
  });
});
