/**
 * CLI Shared Utilities
 * Input reading, error formatting and flag detection for the CLI tools
 */

import * as fs from 'fs';
import { HighlightError, VERSION } from 'cubicle-highlight';

/** Name reported for source read from stdin */
export const STDIN_NAME = '<stdin>';

/**
 * Read a source file, or stdin when file is '-'.
 *
 * @throws Error when the path does not exist or is a directory
 */
export function readSource(file: string): string {
  if (file === '-') {
    // stdin needs the sync API
    return fs.readFileSync(0, 'utf-8');
  }

  if (!fs.existsSync(file)) {
    throw new Error(`File not found: ${file}`);
  }
  if (fs.statSync(file).isDirectory()) {
    throw new Error(`Path is a directory: ${file}`);
  }
  return fs.readFileSync(file, 'utf-8');
}

/**
 * Format an error for stderr output.
 * HighlightErrors carry their registry id.
 */
export function formatError(err: unknown): string {
  if (err instanceof HighlightError) {
    return `Error [${err.errorId}]: ${err.message}`;
  }
  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 *
 * @param argv - Command-line arguments (process.argv.slice(2))
 * @returns Object with mode if flag found, null otherwise
 */
export function detectHelpVersionFlag(
  argv: string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

/**
 * Entry points only run main() outside the test runner.
 */
export function shouldRunMain(): boolean {
  return (
    process.env['NODE_ENV'] !== 'test' &&
    !process.env['VITEST'] &&
    !process.env['VITEST_WORKER_ID']
  );
}

export { VERSION };
