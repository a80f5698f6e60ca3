/**
 * Validator
 * Scans the source once and runs every enabled rule over the result.
 */

import {
  createScannerState,
  nextToken,
  type Token,
} from 'cubicle-highlight';
import { VALIDATION_RULES } from './rules.js';
import type {
  CheckConfig,
  Diagnostic,
  ValidationContext,
  ValidationRule,
} from './types.js';

/** Classified tokens plus the regions left open at end of input */
export function createValidationContext(source: string): ValidationContext {
  const state = createScannerState(source);
  const tokens: Token[] = [];

  let token = nextToken(state);
  while (token !== null) {
    if (token.category !== null) {
      tokens.push(token);
    }
    token = nextToken(state);
  }

  return { source, tokens, openScopes: [...state.scopes] };
}

/**
 * Run enabled rules and return diagnostics ordered by position.
 * A rule set to 'warn' reports as a warning whatever its severity.
 */
export function validateSource(
  source: string,
  config: CheckConfig,
  rules: readonly ValidationRule[] = VALIDATION_RULES
): Diagnostic[] {
  const context = createValidationContext(source);
  const diagnostics: Diagnostic[] = [];

  for (const rule of rules) {
    const state = config.rules[rule.code] ?? 'on';
    if (state === 'off') continue;

    const severity =
      state === 'warn'
        ? 'warning'
        : (config.severity[rule.code] ?? rule.severity);

    for (const found of rule.validate(context)) {
      diagnostics.push({ ...found, severity });
    }
  }

  return diagnostics.sort(
    (a, b) =>
      a.location.offset - b.location.offset || a.code.localeCompare(b.code)
  );
}
