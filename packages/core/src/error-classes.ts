/**
 * Highlight Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface HighlightErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Error raised for API misuse (bad ranges, unknown buffers).
 * Classification itself never throws.
 */
export class HighlightError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: HighlightErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'HighlightError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): HighlightErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @example
 * createError('HL-R002', { line: 9, count: 4 })
 * // HighlightError: "Line 9 out of bounds (1..4)"
 *
 * @throws TypeError if errorId is not registered
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): HighlightError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new HighlightError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}
