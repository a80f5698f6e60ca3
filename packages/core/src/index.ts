/**
 * Cubicle Highlight
 * Lexical classification of Cubicle model files for editors and tools
 */

export {
  BOOLEAN_LITERALS,
  classify,
  COMMENT_MARKERS,
  createScannerState,
  KEYWORDS,
  nextToken,
  OPERATORS,
  rulesForScope,
  saveCheckpoint,
  SCAN_RULES,
  tokenize,
  TYPE_NAMES,
  type ClassifyOptions,
  type RuleScope,
  type ScanRule,
  type ScannerCheckpoint,
  type ScannerState,
  type ScopeFrame,
  type TokenizeOptions,
} from './lexer/index.js';
export { flattenSpans, spanAt } from './spans.js';
export {
  HighlightSession,
  type InvalidateEvent,
  type ScanEvent,
  type SessionCallbacks,
  type SessionOptions,
  type TextEdit,
} from './session.js';
export {
  createSyntaxRegistry,
  type DisableEvent,
  type EnableEvent,
  type RegistryCallbacks,
  type RegistryOptions,
  type SyntaxRegistry,
} from './registry.js';
export { VERSION, VERSION_INFO, type VersionInfo } from './version.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  createError,
  HighlightError,
  type HighlightErrorData,
} from './error-classes.js';

// ============================================================
// SYNTAX HIGHLIGHTING
// ============================================================
export {
  CATEGORY_GROUP_MAP,
  HIGHLIGHT_GROUPS,
  isHighlightGroup,
  presentationGroup,
  type HighlightGroup,
} from './highlight-map.js';

export * from './token-types.js';
export * from './source-location.js';
