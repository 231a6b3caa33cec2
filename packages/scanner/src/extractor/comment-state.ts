import type { LanguageSyntax } from '../languages/registry';
import type { CommentKind, CommentSpan } from '../types';

/** Comment text found on one line, as column offsets excluding the delimiters. */
export interface LineSegment {
  kind: CommentKind;
  start: number;
  end: number;
}

type State = { kind: 'outside' } | { kind: 'insideBlock'; startLine: number; startColumn: number };

interface MarkerHit {
  index: number;
  length: number;
}

function firstLineMarker(line: string, from: number, markers: readonly string[]): MarkerHit | undefined {
  let best: MarkerHit | undefined;
  for (const marker of markers) {
    const index = line.indexOf(marker, from);
    if (index !== -1 && (best === undefined || index < best.index)) {
      best = { index, length: marker.length };
    }
  }
  return best;
}

/**
 * Two-state comment tracker fed one line at a time.
 *
 * Outside a block, whichever of the line marker and the block opener comes first wins; on a tie
 * the block opener wins (Lua's `--[[` versus `--`). Inside a block the first close delimiter ends
 * it, so nested openers are plain text.
 */
export class CommentStateMachine {
  private state: State = { kind: 'outside' };
  private readonly spans: CommentSpan[] = [];
  private lastLine = 0;
  private lastLength = 0;

  constructor(private readonly syntax: LanguageSyntax) {}

  get insideBlock(): boolean {
    return this.state.kind === 'insideBlock';
  }

  feed(line: string, lineNumber: number): LineSegment[] {
    this.lastLine = lineNumber;
    this.lastLength = line.length;

    const segments: LineSegment[] = [];
    const block = this.syntax.blockComment;
    let pos = 0;

    while (pos <= line.length) {
      if (this.state.kind === 'insideBlock') {
        // Only reachable when the language has a block pair.
        const close = block ? line.indexOf(block.close, pos) : -1;
        if (close === -1) {
          segments.push({ kind: 'block', start: pos, end: line.length });
          break;
        }
        segments.push({ kind: 'block', start: pos, end: close });
        this.spans.push({
          kind: 'block',
          startLine: this.state.startLine,
          startColumn: this.state.startColumn,
          endLine: lineNumber,
          endColumn: close,
        });
        this.state = { kind: 'outside' };
        pos = close + (block ? block.close.length : 0);
        continue;
      }

      const marker = firstLineMarker(line, pos, this.syntax.lineComments);
      const open = block ? line.indexOf(block.open, pos) : -1;

      if (block && open !== -1 && (marker === undefined || open <= marker.index)) {
        pos = open + block.open.length;
        this.state = { kind: 'insideBlock', startLine: lineNumber, startColumn: pos };
        continue;
      }

      if (marker) {
        const start = marker.index + marker.length;
        segments.push({ kind: 'line', start, end: line.length });
        this.spans.push({
          kind: 'line',
          startLine: lineNumber,
          startColumn: start,
          endLine: lineNumber,
          endColumn: line.length,
        });
      }
      break;
    }

    return segments;
  }

  /**
   * Completed spans. An unterminated block is closed at the end of the last line.
   */
  finish(): CommentSpan[] {
    if (this.state.kind === 'insideBlock') {
      this.spans.push({
        kind: 'block',
        startLine: this.state.startLine,
        startColumn: this.state.startColumn,
        endLine: this.lastLine,
        endColumn: this.lastLength,
      });
      this.state = { kind: 'outside' };
    }
    return this.spans;
  }
}
