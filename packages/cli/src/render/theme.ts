/**
 * Terminal Theme
 * Presentation group colors for ANSI output, loaded from YAML.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { isHighlightGroup, type HighlightGroup } from 'cubicle-highlight';

export const THEME_FILE = '.cubicle-highlight.yaml';

export const COLOR_CODES = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 37,
  gray: 90,
} as const;

/** 'none' renders the group as plain text */
export type ColorName = keyof typeof COLOR_CODES | 'none';

export type Theme = Readonly<Record<HighlightGroup, ColorName>>;

export const DEFAULT_THEME: Theme = {
  Error: 'red',
  Comment: 'gray',
  Todo: 'yellow',
  Statement: 'magenta',
  Type: 'green',
  Boolean: 'cyan',
  Identifier: 'blue',
  Operator: 'yellow',
  SpecialChar: 'cyan',
  Delimiter: 'white',
  Number: 'cyan',
  Float: 'cyan',
};

function isColorName(value: unknown): value is ColorName {
  return value === 'none' || Object.keys(COLOR_CODES).some((c) => c === value);
}

function invalid(reason: string): Error {
  return new Error(`Invalid theme: ${reason}`);
}

/**
 * Parse a YAML mapping of presentation group to color name and merge
 * it over the default theme. An empty document yields the defaults.
 *
 * @example
 * parseTheme('Comment: green\nTodo: none')
 */
export function parseTheme(text: string): Theme {
  let raw: unknown;
  try {
    raw = yaml.parse(text);
  } catch (err) {
    throw invalid(err instanceof Error ? err.message : String(err));
  }

  if (raw === null || raw === undefined) {
    return DEFAULT_THEME;
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw invalid('expected a mapping of group to color');
  }

  const theme: Record<HighlightGroup, ColorName> = { ...DEFAULT_THEME };
  for (const [group, color] of Object.entries(raw)) {
    if (!isHighlightGroup(group)) {
      throw invalid(`unknown group ${group}`);
    }
    if (!isColorName(color)) {
      throw invalid(`invalid color ${String(color)} for ${group}`);
    }
    theme[group] = color;
  }
  return theme;
}

/**
 * Resolve the theme: an explicit file, else THEME_FILE in cwd, else
 * the defaults.
 */
export function loadTheme(themePath: string | undefined, cwd: string): Theme {
  if (themePath !== undefined) {
    if (!fs.existsSync(themePath)) {
      throw invalid(`file not found: ${themePath}`);
    }
    return parseTheme(fs.readFileSync(themePath, 'utf-8'));
  }

  const local = path.join(cwd, THEME_FILE);
  if (fs.existsSync(local)) {
    return parseTheme(fs.readFileSync(local, 'utf-8'));
  }
  return DEFAULT_THEME;
}
