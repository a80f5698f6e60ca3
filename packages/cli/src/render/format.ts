/**
 * Output Formats
 * Renders classified spans as colored text, JSON or a span listing.
 */

import {
  flattenSpans,
  presentationGroup,
  type ClassifiedSpan,
  type SourceSpan,
  type TextRange,
} from 'cubicle-highlight';
import { COLOR_CODES, type Theme } from './theme.js';

const RESET = '\x1b[0m';

function sgr(code: number): string {
  return `\x1b[${code}m`;
}

function colorize(text: string, span: ClassifiedSpan, theme: Theme): string {
  const group = presentationGroup(span.category);
  if (group === undefined) return text;
  const color = theme[group];
  if (color === 'none') return text;
  // Reset at line ends so a pager shows each line on its own
  return text
    .split('\n')
    .map((part) => (part === '' ? part : `${sgr(COLOR_CODES[color])}${part}${RESET}`))
    .join('\n');
}

/**
 * Render the text of a range with SGR colors. Segments that cross the
 * range boundary are clipped to it.
 */
export function renderAnsi(
  source: string,
  spans: readonly ClassifiedSpan[],
  theme: Theme,
  range: TextRange = { from: 0, to: source.length }
): string {
  let out = '';
  let pos = range.from;

  for (const segment of flattenSpans(spans)) {
    const from = Math.max(segment.span.start.offset, range.from);
    const to = Math.min(segment.span.end.offset, range.to);
    if (to <= from) continue;

    out += source.slice(pos, from);
    out += colorize(source.slice(from, to), segment, theme);
    pos = to;
  }

  return out + source.slice(pos, range.to);
}

interface JsonSpan {
  category: string;
  group: string | null;
  value: string;
  depth: number;
  span: SourceSpan;
}

export function renderJson(
  file: string,
  spans: readonly ClassifiedSpan[]
): string {
  const entries: JsonSpan[] = spans.map((s) => ({
    category: s.category,
    group: presentationGroup(s.category) ?? null,
    value: s.value,
    depth: s.depth,
    span: s.span,
  }));
  return JSON.stringify({ file, spans: entries }, null, 2);
}

/**
 * One line per span: `line:col-line:col category group "value"`.
 * Unmapped categories show '-' as their group.
 */
export function renderSpanList(spans: readonly ClassifiedSpan[]): string {
  return spans
    .map((s) => {
      const { start, end } = s.span;
      const group = presentationGroup(s.category) ?? '-';
      return `${start.line}:${start.column}-${end.line}:${end.column} ${s.category} ${group} ${JSON.stringify(s.value)}`;
    })
    .join('\n');
}
