/**
 * Scanner State
 * Tracks position and open regions while classifying source text
 */

import type { SourceLocation } from '../source-location.js';
import type { RegionKind } from '../token-types.js';

/** An open region: its kind and where its opening delimiter starts */
export interface ScopeFrame {
  readonly kind: RegionKind;
  readonly open: SourceLocation;
}

/**
 * Saved scanner position. Resuming from a checkpoint classifies the rest
 * of the source exactly as an uninterrupted scan would.
 */
export interface ScannerCheckpoint {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  readonly scopes: readonly ScopeFrame[];
}

export interface ScannerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  scopes: ScopeFrame[];
}

export function createScannerState(
  source: string,
  checkpoint?: ScannerCheckpoint
): ScannerState {
  return {
    source,
    pos: checkpoint?.offset ?? 0,
    line: checkpoint?.line ?? 1,
    column: checkpoint?.column ?? 1,
    scopes: checkpoint ? [...checkpoint.scopes] : [],
  };
}

export function saveCheckpoint(state: ScannerState): ScannerCheckpoint {
  return {
    offset: state.pos,
    line: state.line,
    column: state.column,
    scopes: [...state.scopes],
  };
}

export function currentLocation(state: ScannerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.pos,
  };
}

export function peek(state: ScannerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: ScannerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function advance(state: ScannerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: ScannerState): boolean {
  return state.pos >= state.source.length;
}

export function topScope(state: ScannerState): ScopeFrame | undefined {
  return state.scopes[state.scopes.length - 1];
}

export function inComment(state: ScannerState): boolean {
  return topScope(state)?.kind === 'comment';
}

/** Number of comment regions currently open */
export function commentDepth(state: ScannerState): number {
  let depth = 0;
  for (const frame of state.scopes) {
    if (frame.kind === 'comment') depth++;
  }
  return depth;
}
