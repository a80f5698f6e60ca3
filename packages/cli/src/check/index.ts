/**
 * Check Module - Static Analysis for Cubicle files
 * Public API for the cubicle-check tool.
 */

// ============================================================
// PUBLIC TYPES
// ============================================================
export type {
  ValidationRule,
  RuleCategory,
  Severity,
  RuleState,
  Diagnostic,
  CheckConfig,
  ValidationContext,
} from './types.js';

// ============================================================
// RULE REGISTRY
// ============================================================
export { VALIDATION_RULES, extractContextLine } from './rules.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  CONFIG_FILE,
  loadConfig,
  parseConfig,
  createDefaultConfig,
} from './config.js';

// ============================================================
// VALIDATION
// ============================================================
export { validateSource, createValidationContext } from './validator.js';
