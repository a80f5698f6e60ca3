/**
 * Configuration Loader Tests
 * Tests for .cubicle-check.json loading and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILE,
  createDefaultConfig,
  loadConfig,
} from '../../src/check/index.js';

// ============================================================
// TEST FIXTURES
// ============================================================

const TEST_DIR = join(tmpdir(), `cubicle-check-config-${process.pid}`);

function setupTestConfig(config: unknown): string {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(
    join(TEST_DIR, CONFIG_FILE),
    JSON.stringify(config, null, 2),
    'utf-8'
  );
  return TEST_DIR;
}

function setupRawConfig(text: string): void {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(join(TEST_DIR, CONFIG_FILE), text, 'utf-8');
}

function cleanupTestConfig(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

describe('createDefaultConfig', () => {
  it('enables every registered rule', () => {
    expect(createDefaultConfig()).toEqual({
      rules: {
        UNMATCHED_CLOSE: 'on',
        STRAY_COMMENT_CLOSE: 'on',
        UNCLOSED_COMMENT: 'on',
        UNCLOSED_DELIMITER: 'on',
        FLAGGED_MARKER: 'on',
      },
      severity: {},
    });
  });
});

// ============================================================
// FILE NOT FOUND
// ============================================================

describe('loadConfig - file not found', () => {
  beforeEach(() => {
    cleanupTestConfig();
  });

  it('returns null when config file does not exist', () => {
    expect(loadConfig(TEST_DIR)).toBeNull();
  });

  it('returns null for non-existent directory', () => {
    expect(loadConfig('/nonexistent/directory')).toBeNull();
  });
});

// ============================================================
// VALID CONFIGURATION
// ============================================================

describe('loadConfig - valid configuration', () => {
  afterEach(() => {
    cleanupTestConfig();
  });

  it('merges an empty file with the defaults', () => {
    setupTestConfig({});
    expect(loadConfig(TEST_DIR)).toEqual(createDefaultConfig());
  });

  it('overrides rule states', () => {
    setupTestConfig({ rules: { FLAGGED_MARKER: 'off', UNCLOSED_COMMENT: 'warn' } });

    const result = loadConfig(TEST_DIR);
    expect(result?.rules['FLAGGED_MARKER']).toBe('off');
    expect(result?.rules['UNCLOSED_COMMENT']).toBe('warn');
    expect(result?.rules['UNMATCHED_CLOSE']).toBe('on');
  });

  it('overrides severities', () => {
    setupTestConfig({ severity: { UNCLOSED_DELIMITER: 'error' } });
    expect(loadConfig(TEST_DIR)?.severity).toEqual({
      UNCLOSED_DELIMITER: 'error',
    });
  });
});

// ============================================================
// INVALID CONFIGURATION
// ============================================================

describe('loadConfig - invalid configuration', () => {
  afterEach(() => {
    cleanupTestConfig();
  });

  it('throws for malformed JSON', () => {
    setupRawConfig('{ invalid json }');
    expect(() => loadConfig(TEST_DIR)).toThrow(
      'Invalid configuration: invalid JSON'
    );
  });

  it('throws for non-object JSON', () => {
    for (const value of ['string value', [1, 2, 3], null]) {
      setupTestConfig(value);
      expect(() => loadConfig(TEST_DIR)).toThrow(
        'Invalid configuration: config must be an object'
      );
    }
  });

  it('throws when rules or severity is not an object', () => {
    setupTestConfig({ rules: 'invalid' });
    expect(() => loadConfig(TEST_DIR)).toThrow('rules must be an object');

    setupTestConfig({ severity: 'invalid' });
    expect(() => loadConfig(TEST_DIR)).toThrow('severity must be an object');
  });

  it('throws when rule state is invalid', () => {
    setupTestConfig({ rules: { FLAGGED_MARKER: 'invalid_state' } });
    expect(() => loadConfig(TEST_DIR)).toThrow(
      "Invalid configuration: invalid state for FLAGGED_MARKER: must be 'on', 'off', or 'warn'"
    );
  });

  it('throws when severity value is invalid', () => {
    setupTestConfig({ severity: { FLAGGED_MARKER: 'critical' } });
    expect(() => loadConfig(TEST_DIR)).toThrow(
      "Invalid configuration: invalid severity for FLAGGED_MARKER: must be 'error', 'warning', or 'info'"
    );
  });

  it('throws for unknown rules', () => {
    setupTestConfig({ rules: { UNKNOWN_RULE: 'on' } });
    expect(() => loadConfig(TEST_DIR)).toThrow(
      'Invalid configuration: unknown rule UNKNOWN_RULE'
    );

    setupTestConfig({ severity: { UNKNOWN_RULE: 'error' } });
    expect(() => loadConfig(TEST_DIR)).toThrow('unknown rule UNKNOWN_RULE');
  });
});
