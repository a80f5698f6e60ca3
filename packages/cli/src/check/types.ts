/**
 * Check Types
 * Type definitions for cubicle-check validation rules and configuration.
 */

import type {
  ScopeFrame,
  SourceLocation,
  Token,
} from 'cubicle-highlight';

// ============================================================
// SEVERITY AND STATE
// ============================================================

export type Severity = 'error' | 'warning' | 'info';

/** on: default severity, off: skipped, warn: reported as warning */
export type RuleState = 'on' | 'off' | 'warn';

export type RuleCategory = 'balance' | 'comments' | 'markers';

// ============================================================
// DIAGNOSTICS
// ============================================================

export interface Diagnostic {
  readonly location: SourceLocation;
  readonly severity: Severity;
  readonly code: string;
  readonly message: string;
  /** Trimmed source line containing the location */
  readonly context: string;
}

// ============================================================
// RULES
// ============================================================

/** Scan results shared by every rule */
export interface ValidationContext {
  readonly source: string;
  /** Classified tokens, whitespace and unclassified text removed */
  readonly tokens: readonly Token[];
  /** Regions still open at end of input, outermost first */
  readonly openScopes: readonly ScopeFrame[];
}

export interface ValidationRule {
  readonly code: string;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly description: string;
  validate(context: ValidationContext): Diagnostic[];
}

// ============================================================
// CONFIGURATION
// ============================================================

export interface CheckConfig {
  readonly rules: Record<string, RuleState>;
  readonly severity: Record<string, Severity>;
}
