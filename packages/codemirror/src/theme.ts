/**
 * Theme Extension Module
 *
 * CodeMirror theme following the presentation groups of the
 * cubicle-highlight map. Light and dark variants.
 */

import { EditorView } from '@codemirror/view';
import type { Extension } from '@codemirror/state';
import { syntaxHighlighting, HighlightStyle } from '@codemirror/language';
import { tags } from '@lezer/highlight';
import type { HighlightGroup } from 'cubicle-highlight';

type Palette = Readonly<Record<HighlightGroup, string>> & {
  readonly background: string;
  readonly foreground: string;
  readonly gutter: string;
  readonly selection: string;
};

const LIGHT: Palette = {
  background: '#ffffff',
  foreground: '#1f2328',
  gutter: '#f6f8fa',
  selection: '#b6d7ff',
  Error: '#cf222e',
  Comment: '#6e7781',
  Todo: '#9a6700',
  Statement: '#8250df',
  Type: '#116329',
  Boolean: '#0550ae',
  Identifier: '#0969da',
  Operator: '#953800',
  SpecialChar: '#0550ae',
  Delimiter: '#57606a',
  Number: '#0550ae',
  Float: '#0550ae',
};

const DARK: Palette = {
  background: '#0d1117',
  foreground: '#e6edf3',
  gutter: '#161b22',
  selection: '#264f78',
  Error: '#ff7b72',
  Comment: '#8b949e',
  Todo: '#d29922',
  Statement: '#d2a8ff',
  Type: '#7ee787',
  Boolean: '#79c0ff',
  Identifier: '#79c0ff',
  Operator: '#ffa657',
  SpecialChar: '#a5d6ff',
  Delimiter: '#8b949e',
  Number: '#79c0ff',
  Float: '#79c0ff',
};

/**
 * Create the CodeMirror theme extension.
 *
 * @param darkMode - Use the dark palette
 */
export function createThemeExtension(darkMode = false): Extension {
  const colors = darkMode ? DARK : LIGHT;

  const highlightStyle = HighlightStyle.define([
    { tag: tags.invalid, color: colors.Error, textDecoration: 'underline wavy' },
    { tag: tags.comment, color: colors.Comment, fontStyle: 'italic' },
    { tag: tags.annotation, color: colors.Todo, fontWeight: 'bold' },
    { tag: tags.keyword, color: colors.Statement },
    { tag: tags.typeName, color: colors.Type },
    { tag: tags.bool, color: colors.Boolean },
    { tag: tags.variableName, color: colors.Identifier },
    { tag: tags.operator, color: colors.Operator },
    { tag: tags.atom, color: colors.SpecialChar },
    { tag: tags.punctuation, color: colors.Delimiter },
    { tag: tags.integer, color: colors.Number },
    { tag: tags.float, color: colors.Float },
  ]);

  const chromeTheme = EditorView.theme(
    {
      '&': {
        backgroundColor: colors.background,
        color: colors.foreground,
      },
      '.cm-selectionBackground, .cm-selectionMatch': {
        backgroundColor: colors.selection,
      },
      '.cm-gutters': {
        backgroundColor: colors.gutter,
        color: colors.Comment,
        border: 'none',
      },
    },
    { dark: darkMode }
  );

  return [chromeTheme, syntaxHighlighting(highlightStyle)];
}
