/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'range' | 'session';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: HL-{R|S}{3-digit} (e.g., HL-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  {
    errorId: 'HL-R001',
    category: 'range',
    description: 'Range outside buffer',
    messageTemplate: 'Invalid range {from}..{to} for buffer of length {length}',
  },
  {
    errorId: 'HL-R002',
    category: 'range',
    description: 'Line out of bounds',
    messageTemplate: 'Line {line} out of bounds (1..{count})',
  },
  {
    errorId: 'HL-R003',
    category: 'range',
    description: 'Edit outside buffer',
    messageTemplate:
      'Invalid edit {from}..{to} for buffer of length {length}',
  },
  {
    errorId: 'HL-S001',
    category: 'session',
    description: 'Syntax not enabled for buffer',
    messageTemplate: 'Syntax highlighting is not enabled for buffer {bufferId}',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Replace {placeholder} tokens with values from context.
 * Missing keys render as empty strings.
 *
 * @example
 * renderMessage('Line {line} out of bounds', { line: 7 })
 * // "Line 7 out of bounds"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = context[key];
    if (value === undefined || value === null) {
      return '';
    }
    if (typeof value === 'object') {
      return JSON.stringify(value);
    }
    return String(value);
  });
}
