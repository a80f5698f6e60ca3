/**
 * Highlight Session
 * Incremental classification of one buffer. The scope stack at each
 * line start is cached, so re-classifying a visible or edited range
 * resumes from the nearest line instead of the top of the buffer.
 */

import { createError } from './error-classes.js';
import { scanSpans, validateRange } from './lexer/classifier.js';
import { nextToken } from './lexer/tokenizer.js';
import {
  createScannerState,
  saveCheckpoint,
  type ScannerCheckpoint,
  type ScopeFrame,
} from './lexer/state.js';
import { locationWithin, type TextRange } from './source-location.js';
import type { ClassifiedSpan, Token } from './token-types.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted after a range has been classified */
export interface ScanEvent {
  /** First line scanned (1-based) */
  fromLine: number;
  /** Spans reported */
  spanCount: number;
  /** Line checkpoints cached after the scan */
  cachedLines: number;
  durationMs: number;
}

/** Event emitted when an edit drops cached line checkpoints */
export interface InvalidateEvent {
  /** Line containing the start of the edit */
  line: number;
  /** Checkpoints discarded */
  dropped: number;
}

export interface SessionCallbacks {
  onScan?: (event: ScanEvent) => void;
  onInvalidate?: (event: InvalidateEvent) => void;
}

export interface SessionOptions {
  callbacks?: SessionCallbacks;
}

/** Replace [from, to) with insert */
export interface TextEdit {
  readonly from: number;
  readonly to: number;
  readonly insert: string;
}

// ============================================================
// SESSION
// ============================================================

export class HighlightSession {
  private source: string;
  private lineStarts: number[];
  /** checkpoints[i] is the scanner state at the start of line i + 1 */
  private checkpoints: ScannerCheckpoint[];
  private readonly callbacks: SessionCallbacks;

  constructor(text: string, options?: SessionOptions) {
    this.source = text;
    this.lineStarts = computeLineStarts(text);
    this.checkpoints = [{ offset: 0, line: 1, column: 1, scopes: [] }];
    this.callbacks = options?.callbacks ?? {};
  }

  get text(): string {
    return this.source;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** Number of lines whose start state is cached */
  get cachedLines(): number {
    return this.checkpoints.length;
  }

  /** Offsets of a line, including its trailing newline */
  lineRange(line: number): TextRange {
    this.assertLine(line);
    const from = this.lineStarts[line - 1] ?? 0;
    const to = this.lineStarts[line] ?? this.source.length;
    return { from, to };
  }

  /** 1-based line containing an offset */
  lineAt(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }

  /**
   * Classify a range (the whole buffer by default). The result equals
   * classify(text, { range }).
   */
  classifyRange(range?: TextRange): ClassifiedSpan[] {
    const target = range ?? { from: 0, to: this.source.length };
    validateRange(this.source, target);

    const started = Date.now();
    const fromLine = this.lineAt(target.from);
    const checkpoint = this.checkpointFor(fromLine);

    const spans = scanSpans(
      this.source,
      { range: target, checkpoint },
      { onLineStart: (cp) => this.record(cp) }
    );

    this.callbacks.onScan?.({
      fromLine,
      spanCount: spans.length,
      cachedLines: this.checkpoints.length,
      durationMs: Date.now() - started,
    });

    return spans;
  }

  /** Flat tokens of one line, including whitespace when requested */
  tokenizeLine(line: number, options?: { includePlain?: boolean }): Token[] {
    const { to } = this.lineRange(line);
    const state = createScannerState(this.source, this.checkpointFor(line));
    const tokens: Token[] = [];

    while (state.pos < to) {
      const token = nextToken(state);
      if (token === null) break;
      tokens.push(token);
    }
    if (state.column === 1) {
      this.record(saveCheckpoint(state));
    }

    if (options?.includePlain === true) return tokens;
    return tokens.filter((t) => t.category !== null);
  }

  /** Open regions at the start of a line, outermost first */
  scopesAtLine(line: number): readonly ScopeFrame[] {
    this.assertLine(line);
    return this.checkpointFor(line).scopes;
  }

  /**
   * Apply an edit. Line states up to the edited line stay valid since
   * they only depend on the text before them.
   *
   * @throws HighlightError HL-R003 when the edit lies outside the buffer
   */
  applyEdit(edit: TextEdit): void {
    const { from, to } = edit;
    if (
      !Number.isInteger(from) ||
      !Number.isInteger(to) ||
      from < 0 ||
      from > to ||
      to > this.source.length
    ) {
      throw createError(
        'HL-R003',
        { from, to, length: this.source.length },
        locationWithin(this.source, from)
      );
    }

    const line = this.lineAt(from);
    this.source =
      this.source.slice(0, from) + edit.insert + this.source.slice(to);
    this.lineStarts = computeLineStarts(this.source);

    const dropped = Math.max(0, this.checkpoints.length - line);
    this.checkpoints.length = Math.min(this.checkpoints.length, line);

    this.callbacks.onInvalidate?.({ line, dropped });
  }

  // ============================================================
  // CHECKPOINTS
  // ============================================================

  private checkpointFor(line: number): ScannerCheckpoint {
    this.extendCheckpoints(line);
    const checkpoint = this.checkpoints[line - 1];
    if (checkpoint === undefined) {
      throw createError('HL-R002', { line, count: this.lineCount });
    }
    return checkpoint;
  }

  /** Scan forward from the last cached line until `line` is cached */
  private extendCheckpoints(line: number): void {
    const last = this.checkpoints[this.checkpoints.length - 1];
    if (this.checkpoints.length >= line || last === undefined) return;

    const state = createScannerState(this.source, last);
    while (this.checkpoints.length < line) {
      const token = nextToken(state);
      if (token === null) break;
      if (state.column === 1) {
        this.record(saveCheckpoint(state));
      }
    }
  }

  /** Cache a line-start checkpoint if it is the next one missing */
  private record(checkpoint: ScannerCheckpoint): void {
    if (
      checkpoint.column === 1 &&
      checkpoint.line === this.checkpoints.length + 1
    ) {
      this.checkpoints.push(checkpoint);
    }
  }

  private assertLine(line: number): void {
    if (!Number.isInteger(line) || line < 1 || line > this.lineCount) {
      throw createError('HL-R002', { line, count: this.lineCount });
    }
  }
}

function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') starts.push(i + 1);
  }
  return starts;
}
