/**
 * Lexer Module
 * Classifies source text with the priority-ordered rule table
 */

export {
  classify,
  validateRange,
  type ClassifyOptions,
  type ScanHooks,
} from './classifier.js';
export { SCAN_RULES, rulesForScope, type RuleScope, type ScanRule } from './rules.js';
export {
  createScannerState,
  saveCheckpoint,
  type ScannerCheckpoint,
  type ScannerState,
  type ScopeFrame,
} from './state.js';
export { nextToken, tokenize, type TokenizeOptions } from './tokenizer.js';
export {
  BOOLEAN_LITERALS,
  COMMENT_MARKERS,
  KEYWORDS,
  OPERATORS,
  TYPE_NAMES,
} from './vocabulary.js';
