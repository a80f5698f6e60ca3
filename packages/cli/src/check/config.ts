/**
 * Configuration Loader
 * Reads .cubicle-check.json and merges it over the defaults.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { VALIDATION_RULES } from './rules.js';
import type { CheckConfig, RuleState, Severity } from './types.js';

export const CONFIG_FILE = '.cubicle-check.json';

const RULE_STATES: readonly RuleState[] = ['on', 'off', 'warn'];
const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info'];

function isRuleState(value: unknown): value is RuleState {
  return RULE_STATES.some((state) => state === value);
}

function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(reason: string): Error {
  return new Error(`Invalid configuration: ${reason}`);
}

/**
 * Every registered rule on, no severity overrides.
 */
export function createDefaultConfig(): CheckConfig {
  const rules: Record<string, RuleState> = {};
  for (const rule of VALIDATION_RULES) {
    rules[rule.code] = 'on';
  }
  return { rules, severity: {} };
}

/**
 * Load configuration from a directory.
 *
 * @returns null when the directory has no config file
 * @throws Error when the file is not valid JSON or names unknown rules
 */
export function loadConfig(cwd: string): CheckConfig | null {
  const configPath = join(cwd, CONFIG_FILE);
  if (!existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    throw invalid('invalid JSON');
  }

  return parseConfig(raw);
}

/** Validate a parsed config object and merge it over the defaults */
export function parseConfig(raw: unknown): CheckConfig {
  if (!isRecord(raw)) {
    throw invalid('config must be an object');
  }

  const known = new Set(VALIDATION_RULES.map((rule) => rule.code));
  const defaults = createDefaultConfig();
  const rules = { ...defaults.rules };
  const severity = { ...defaults.severity };

  const rawRules = raw['rules'];
  if (rawRules !== undefined) {
    if (!isRecord(rawRules)) {
      throw invalid('rules must be an object');
    }
    for (const [code, state] of Object.entries(rawRules)) {
      if (!known.has(code)) {
        throw invalid(`unknown rule ${code}`);
      }
      if (!isRuleState(state)) {
        throw invalid(
          `invalid state for ${code}: must be 'on', 'off', or 'warn'`
        );
      }
      rules[code] = state;
    }
  }

  const rawSeverity = raw['severity'];
  if (rawSeverity !== undefined) {
    if (!isRecord(rawSeverity)) {
      throw invalid('severity must be an object');
    }
    for (const [code, value] of Object.entries(rawSeverity)) {
      if (!known.has(code)) {
        throw invalid(`unknown rule ${code}`);
      }
      if (!isSeverity(value)) {
        throw invalid(
          `invalid severity for ${code}: must be 'error', 'warning', or 'info'`
        );
      }
      severity[code] = value;
    }
  }

  return { rules, severity };
}
