#!/usr/bin/env node
/**
 * cubicle-highlight
 *
 * Prints a Cubicle file with terminal colors, or its classified spans
 * as JSON or a plain listing.
 *
 * Usage:
 *   cubicle-highlight model.cub
 *   cubicle-highlight --format spans --range 0:120 model.cub
 *   echo "var X : bool" | cubicle-highlight -
 *   cubicle-highlight -e "X := True"
 */

import { classify, type TextRange } from 'cubicle-highlight';
import {
  detectHelpVersionFlag,
  formatError,
  readSource,
  shouldRunMain,
  STDIN_NAME,
  VERSION,
} from './cli-shared.js';
import { renderAnsi, renderJson, renderSpanList } from './render/format.js';
import { loadTheme } from './render/theme.js';

export type HighlightFormat = 'ansi' | 'json' | 'spans';

export type HighlightInput =
  | { kind: 'file'; path: string }
  | { kind: 'stdin' }
  | { kind: 'inline'; code: string };

export type ParsedHighlightArgs =
  | {
      mode: 'highlight';
      input: HighlightInput;
      format: HighlightFormat;
      range: TextRange | undefined;
      theme: string | undefined;
    }
  | { mode: 'help' | 'version' };

const VALUE_FLAGS = ['--format', '--range', '--theme', '-e'];

const USAGE = `Usage:
  cubicle-highlight [options] <file>   Highlight a Cubicle file
  cubicle-highlight [options] -        Read source from stdin
  cubicle-highlight -e "<code>"        Highlight inline source
  cubicle-highlight --help             Show this help message
  cubicle-highlight --version          Show version information

Options:
  --format <format>    Output format: ansi, json, spans (default: ansi)
  --range <from>:<to>  Only output spans overlapping this offset range
  --theme <file>       YAML theme (default: .cubicle-highlight.yaml if present)`;

/**
 * Parse `<from>:<to>` into a range. Bounds are checked against the
 * source when classifying.
 */
export function parseRange(value: string): TextRange {
  const match = /^(\d+):(\d+)$/.exec(value);
  if (match === null || match[1] === undefined || match[2] === undefined) {
    throw new Error(`Invalid --range value: ${value}. Expected <from>:<to>`);
  }
  return { from: parseInt(match[1], 10), to: parseInt(match[2], 10) };
}

/**
 * Parse command-line arguments for cubicle-highlight
 *
 * @throws Error on unknown options, missing values or a missing input
 */
export function parseHighlightArgs(argv: string[]): ParsedHighlightArgs {
  const helpVersion = detectHelpVersionFlag(argv);
  if (helpVersion !== null) {
    return helpVersion;
  }

  let format: HighlightFormat = 'ansi';
  let range: TextRange | undefined;
  let theme: string | undefined;
  let input: HighlightInput | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (VALUE_FLAGS.includes(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      i++;

      if (arg === '--format') {
        if (value !== 'ansi' && value !== 'json' && value !== 'spans') {
          throw new Error(
            `Invalid --format value: ${value}. Must be one of: ansi, json, spans`
          );
        }
        format = value;
      } else if (arg === '--range') {
        range = parseRange(value);
      } else if (arg === '--theme') {
        theme = value;
      } else {
        input ??= { kind: 'inline', code: value };
      }
      continue;
    }

    if (arg === '-') {
      input ??= { kind: 'stdin' };
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }

    input ??= { kind: 'file', path: arg };
  }

  if (input === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'highlight', input, format, range, theme };
}

function readInput(input: HighlightInput): { name: string; source: string } {
  switch (input.kind) {
    case 'file':
      return { name: input.path, source: readSource(input.path) };
    case 'stdin':
      return { name: STDIN_NAME, source: readSource('-') };
    case 'inline':
      return { name: '<inline>', source: input.code };
  }
}

/**
 * Render source in the requested format
 */
export function renderSource(
  name: string,
  source: string,
  options: {
    format: HighlightFormat;
    range?: TextRange | undefined;
    theme?: string | undefined;
    cwd?: string | undefined;
  }
): string {
  const spans = classify(
    source,
    options.range !== undefined ? { range: options.range } : {}
  );

  switch (options.format) {
    case 'json':
      return renderJson(name, spans);
    case 'spans':
      return renderSpanList(spans);
    case 'ansi': {
      const theme = loadTheme(options.theme, options.cwd ?? process.cwd());
      return renderAnsi(source, spans, theme, options.range);
    }
  }
}

/**
 * Entry point for the cubicle-highlight binary
 */
export function main(argv: string[] = process.argv.slice(2)): number {
  try {
    const parsed = parseHighlightArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(VERSION);
        return 0;

      case 'highlight': {
        const { name, source } = readInput(parsed.input);
        const output = renderSource(name, source, parsed);
        if (output !== '') {
          console.log(output);
        }
        return 0;
      }
    }
  } catch (err) {
    console.error(formatError(err));
    return 1;
  }
}

if (shouldRunMain()) {
  process.exitCode = main();
}
