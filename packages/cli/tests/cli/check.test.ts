/**
 * CLI Tests: cubicle-check command
 */

import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type MockInstance,
} from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  exitCodeFor,
  formatDiagnostics,
  main,
  parseCheckArgs,
} from '../../src/cli-check.js';
import {
  createDefaultConfig,
  validateSource,
  type Diagnostic,
} from '../../src/check/index.js';

describe('cubicle-check CLI', () => {
  let tempDir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cubicle-check-test-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function writeFile(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  // ============================================================
  // ARGUMENT PARSING
  // ============================================================

  describe('parseCheckArgs', () => {
    it('parses file path', () => {
      expect(parseCheckArgs(['model.cub'])).toEqual({
        mode: 'check',
        file: 'model.cub',
        verbose: false,
        format: 'text',
      });
    });

    it('parses --help and --version flags', () => {
      expect(parseCheckArgs(['--help'])).toEqual({ mode: 'help' });
      expect(parseCheckArgs(['-v'])).toEqual({ mode: 'version' });
    });

    it('parses --verbose and --format json', () => {
      expect(
        parseCheckArgs(['--verbose', '--format', 'json', 'model.cub'])
      ).toEqual({
        mode: 'check',
        file: 'model.cub',
        verbose: true,
        format: 'json',
      });
    });

    it('accepts stdin as the file', () => {
      const parsed = parseCheckArgs(['-']);
      expect(parsed.mode === 'check' && parsed.file).toBe('-');
    });

    it('throws on an invalid format', () => {
      expect(() => parseCheckArgs(['--format', 'xml', 'a.cub'])).toThrow(
        'Invalid --format value: xml. Must be one of: text, json'
      );
    });

    it('throws on unknown flag', () => {
      expect(() => parseCheckArgs(['--unknown'])).toThrow(
        'Unknown option: --unknown'
      );
      expect(() => parseCheckArgs(['-x'])).toThrow('Unknown option: -x');
    });

    it('throws when missing file argument', () => {
      expect(() => parseCheckArgs([])).toThrow('Missing file argument');
      expect(() => parseCheckArgs(['--verbose'])).toThrow(
        'Missing file argument'
      );
    });
  });

  // ============================================================
  // DIAGNOSTIC FORMATTING
  // ============================================================

  describe('formatDiagnostics', () => {
    const diagnostics = validateSource('( ]', createDefaultConfig());

    it('formats text output', () => {
      expect(formatDiagnostics('m.cub', diagnostics, 'text', false)).toBe(
        "m.cub:1:1: warning: Unclosed '(' (UNCLOSED_DELIMITER)\n" +
          "m.cub:1:3: error: Unmatched closing delimiter ']' (UNMATCHED_CLOSE)"
      );
    });

    it('adds rule categories to verbose text output', () => {
      const output = formatDiagnostics('m.cub', diagnostics, 'text', true);
      expect(output.split('\n')[0]).toBe(
        "m.cub:1:1: warning: Unclosed '(' (UNCLOSED_DELIMITER) [balance]"
      );
    });

    it('formats JSON output', () => {
      const [, unmatched] = diagnostics;
      const output = formatDiagnostics(
        'm.cub',
        unmatched ? [unmatched] : [],
        'json',
        false
      );
      expect(JSON.parse(output)).toEqual({
        file: 'm.cub',
        errors: [
          {
            location: { line: 1, column: 3, offset: 2 },
            severity: 'error',
            code: 'UNMATCHED_CLOSE',
            message: "Unmatched closing delimiter ']'",
            context: '( ]',
          },
        ],
        summary: { total: 1, errors: 1, warnings: 0, info: 0 },
      });
    });

    it('includes category in JSON output when verbose', () => {
      const output = formatDiagnostics('m.cub', diagnostics, 'json', true);
      const parsed: unknown = JSON.parse(output);
      expect(parsed).toMatchObject({
        errors: [{ category: 'balance' }, { category: 'balance' }],
        summary: { total: 2, errors: 1, warnings: 1, info: 0 },
      });
    });

    it('formats empty diagnostics as empty string', () => {
      expect(formatDiagnostics('m.cub', [], 'text', false)).toBe('');
    });
  });

  describe('exitCodeFor', () => {
    const at = { line: 1, column: 1, offset: 0 };
    const diagnostic = (severity: Diagnostic['severity']): Diagnostic => ({
      location: at,
      severity,
      code: 'FLAGGED_MARKER',
      message: '',
      context: '',
    });

    it('is 0 without diagnostics or with info only', () => {
      expect(exitCodeFor([])).toBe(0);
      expect(exitCodeFor([diagnostic('info')])).toBe(0);
    });

    it('is 1 with warnings or errors', () => {
      expect(exitCodeFor([diagnostic('warning')])).toBe(1);
      expect(exitCodeFor([diagnostic('info'), diagnostic('error')])).toBe(1);
    });
  });

  // ============================================================
  // MAIN
  // ============================================================

  describe('main', () => {
    it('exits 0 for a clean file', () => {
      const file = writeFile('clean.cub', 'var X : bool\n');
      expect(main([file])).toBe(0);
      expect(log).not.toHaveBeenCalled();
    });

    it('prints info diagnostics and exits 0', () => {
      const file = writeFile('todo.cub', '(* TODO *)');
      expect(main([file])).toBe(0);
      expect(log).toHaveBeenCalledWith(
        `${file}:1:4: info: TODO marker in comment (FLAGGED_MARKER)`
      );
    });

    it('exits 1 when errors are found', () => {
      const file = writeFile('broken.cub', 'X := (1 ]');
      expect(main([file])).toBe(1);
      expect(log).toHaveBeenCalledTimes(1);
    });

    it('exits 2 for a missing file', () => {
      expect(main(['/nonexistent/model.cub'])).toBe(2);
      expect(error).toHaveBeenCalledWith(
        'Error: File not found: /nonexistent/model.cub'
      );
    });

    it('exits 2 for a directory', () => {
      expect(main([tempDir])).toBe(2);
      expect(error).toHaveBeenCalledWith(
        `Error: Path is a directory: ${tempDir}`
      );
    });

    it('exits 2 for an unknown option', () => {
      expect(main(['--fix', 'a.cub'])).toBe(2);
      expect(error).toHaveBeenCalledWith('Error: Unknown option: --fix');
    });

    it('prints usage for --help', () => {
      expect(main(['--help'])).toBe(0);
      const [usage] = log.mock.calls[0] ?? [];
      expect(String(usage)).toContain('cubicle-check [options] <file>');
    });

    it('prints the version', () => {
      expect(main(['--version'])).toBe(0);
      expect(log).toHaveBeenCalledWith('0.1.0');
    });
  });
});
