#!/usr/bin/env node
/**
 * cubicle-check
 *
 * Reports unbalanced delimiters, unterminated comments and flagged
 * comment markers in a Cubicle file.
 *
 * Exit codes: 0 no errors or warnings, 1 errors or warnings found,
 * 2 unreadable input, bad arguments or invalid configuration.
 */

import {
  createDefaultConfig,
  loadConfig,
  validateSource,
  VALIDATION_RULES,
  type Diagnostic,
} from './check/index.js';
import {
  detectHelpVersionFlag,
  formatError,
  readSource,
  shouldRunMain,
  STDIN_NAME,
  VERSION,
} from './cli-shared.js';

export type CheckFormat = 'text' | 'json';

export type ParsedCheckArgs =
  | { mode: 'check'; file: string; verbose: boolean; format: CheckFormat }
  | { mode: 'help' | 'version' };

const KNOWN_FLAGS = [
  '--help',
  '-h',
  '--version',
  '-v',
  '--verbose',
  '--format',
];

const USAGE = `Usage:
  cubicle-check [options] <file>   Check a Cubicle file
  cubicle-check -                  Read the file from stdin
  cubicle-check --help             Show this help message
  cubicle-check --version          Show version information

Options:
  --format <format>   Output format: text, json (default: text)
  --verbose           Include rule categories in the output

Configuration:
  .cubicle-check.json in the working directory:
  { "rules": { "FLAGGED_MARKER": "off" }, "severity": { "UNCLOSED_DELIMITER": "error" } }`;

/**
 * Parse command-line arguments for cubicle-check
 *
 * @throws Error on unknown options or a missing file argument
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  const helpVersion = detectHelpVersionFlag(argv);
  if (helpVersion !== null) {
    return helpVersion;
  }

  let format: CheckFormat = 'text';
  let verbose = false;
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--format') {
      const value = argv[i + 1];
      if (value !== 'text' && value !== 'json') {
        throw new Error(
          `Invalid --format value: ${value ?? ''}. Must be one of: text, json`
        );
      }
      format = value;
      i++;
      continue;
    }

    if (arg === '--verbose') {
      verbose = true;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-' && !KNOWN_FLAGS.includes(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }

    file ??= arg;
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'check', file, verbose, format };
}

/**
 * Format diagnostics as text lines or a JSON report.
 * Verbose output adds the category of each diagnostic's rule.
 */
export function formatDiagnostics(
  file: string,
  diagnostics: Diagnostic[],
  format: CheckFormat,
  verbose: boolean
): string {
  const categoryOf = (code: string): string | undefined =>
    VALIDATION_RULES.find((rule) => rule.code === code)?.category;

  if (format === 'json') {
    const errors = diagnostics.map((d) => {
      const category = verbose ? categoryOf(d.code) : undefined;
      return {
        location: d.location,
        severity: d.severity,
        code: d.code,
        message: d.message,
        context: d.context,
        ...(category !== undefined ? { category } : {}),
      };
    });
    return JSON.stringify(
      { file, errors, summary: summarize(diagnostics) },
      null,
      2
    );
  }

  return diagnostics
    .map((d) => {
      const line = `${file}:${d.location.line}:${d.location.column}: ${d.severity}: ${d.message} (${d.code})`;
      const category = verbose ? categoryOf(d.code) : undefined;
      return category !== undefined ? `${line} [${category}]` : line;
    })
    .join('\n');
}

function summarize(diagnostics: Diagnostic[]): {
  total: number;
  errors: number;
  warnings: number;
  info: number;
} {
  return {
    total: diagnostics.length,
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
    info: diagnostics.filter((d) => d.severity === 'info').length,
  };
}

/** 1 when any diagnostic is an error or a warning */
export function exitCodeFor(diagnostics: Diagnostic[]): number {
  return diagnostics.some((d) => d.severity !== 'info') ? 1 : 0;
}

/**
 * Entry point for the cubicle-check binary
 */
export function main(argv: string[] = process.argv.slice(2)): number {
  try {
    const parsed = parseCheckArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(VERSION);
        return 0;

      case 'check': {
        const source = readSource(parsed.file);
        const config = loadConfig(process.cwd()) ?? createDefaultConfig();
        const diagnostics = validateSource(source, config);
        const name = parsed.file === '-' ? STDIN_NAME : parsed.file;

        const output = formatDiagnostics(
          name,
          diagnostics,
          parsed.format,
          parsed.verbose
        );
        if (output !== '') {
          console.log(output);
        }
        return exitCodeFor(diagnostics);
      }
    }
  } catch (err) {
    console.error(formatError(err));
    return 2;
  }
}

if (shouldRunMain()) {
  process.exitCode = main();
}
