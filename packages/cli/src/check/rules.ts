/**
 * Validation Rules
 * Balance and comment checks over the classified token stream.
 */

import type { EnclosureKind, SourceLocation } from 'cubicle-highlight';
import type {
  Diagnostic,
  Severity,
  ValidationContext,
  ValidationRule,
} from './types.js';

const OPENERS: Record<EnclosureKind, string> = {
  paren: '(',
  brace: '{',
  bracket: '[',
};

/** Trimmed text of the line containing a location */
export function extractContextLine(
  source: string,
  location: SourceLocation
): string {
  const lineStart = location.offset - (location.column - 1);
  const lineEnd = source.indexOf('\n', location.offset);
  return source
    .slice(lineStart, lineEnd === -1 ? source.length : lineEnd)
    .trim();
}

function diagnostic(
  rule: ValidationRule,
  context: ValidationContext,
  location: SourceLocation,
  message: string,
  severity: Severity = rule.severity
): Diagnostic {
  return {
    location,
    severity,
    code: rule.code,
    message,
    context: extractContextLine(context.source, location),
  };
}

// ============================================================
// BALANCE RULES
// ============================================================

export const UNMATCHED_CLOSE: ValidationRule = {
  code: 'UNMATCHED_CLOSE',
  category: 'balance',
  severity: 'error',
  description: 'Closing delimiter without a matching opener',

  validate(context) {
    return context.tokens
      .filter((t) => t.category === 'error' && t.value.length === 1)
      .map((t) =>
        diagnostic(
          this,
          context,
          t.span.start,
          `Unmatched closing delimiter '${t.value}'`
        )
      );
  },
};

export const UNCLOSED_DELIMITER: ValidationRule = {
  code: 'UNCLOSED_DELIMITER',
  category: 'balance',
  severity: 'warning',
  description: 'Opening delimiter never closed',

  validate(context) {
    const diagnostics: Diagnostic[] = [];
    for (const frame of context.openScopes) {
      if (frame.kind === 'comment') continue;
      diagnostics.push(
        diagnostic(
          this,
          context,
          frame.open,
          `Unclosed '${OPENERS[frame.kind]}'`
        )
      );
    }
    return diagnostics;
  },
};

// ============================================================
// COMMENT RULES
// ============================================================

export const STRAY_COMMENT_CLOSE: ValidationRule = {
  code: 'STRAY_COMMENT_CLOSE',
  category: 'comments',
  severity: 'error',
  description: 'Comment close outside any comment',

  validate(context) {
    return context.tokens
      .filter((t) => t.category === 'error' && t.value === '*)')
      .map((t) =>
        diagnostic(this, context, t.span.start, "Stray '*)' outside a comment")
      );
  },
};

export const UNCLOSED_COMMENT: ValidationRule = {
  code: 'UNCLOSED_COMMENT',
  category: 'comments',
  severity: 'error',
  description: 'Comment runs to the end of the file',

  validate(context) {
    const diagnostics: Diagnostic[] = [];
    for (const frame of context.openScopes) {
      if (frame.kind !== 'comment') continue;
      diagnostics.push(
        diagnostic(
          this,
          context,
          frame.open,
          `Unmatched comment at line ${frame.open.line}`
        )
      );
    }
    return diagnostics;
  },
};

// ============================================================
// MARKER RULES
// ============================================================

export const FLAGGED_MARKER: ValidationRule = {
  code: 'FLAGGED_MARKER',
  category: 'markers',
  severity: 'info',
  description: 'TODO, FIXME, XXX or NOTE inside a comment',

  validate(context) {
    return context.tokens
      .filter((t) => t.category === 'todo')
      .map((t) =>
        diagnostic(this, context, t.span.start, `${t.value} marker in comment`)
      );
  },
};

// ============================================================
// RULE REGISTRY
// ============================================================

export const VALIDATION_RULES: readonly ValidationRule[] = [
  UNMATCHED_CLOSE,
  STRAY_COMMENT_CLOSE,
  UNCLOSED_COMMENT,
  UNCLOSED_DELIMITER,
  FLAGGED_MARKER,
];
