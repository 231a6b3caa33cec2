import type { LanguageSyntax } from '../languages/registry';
import type { CommentSpan, Finding } from '../types';
import { CommentStateMachine, type LineSegment } from './comment-state';
import { decodeText, assertText } from './decode';
import { splitLines } from './line-splitter';
import { parseMetadata } from './metadata';
import { TagVocabulary } from './vocabulary';

const MESSAGE_LEAD = /^[:\-\s]+/;

export type LineSource = Iterable<string> | AsyncIterable<string>;

/**
 * Per-file extraction run. Feed lines in order, then read `findings`.
 */
export class ExtractionRun {
  readonly findings: Finding[] = [];
  private readonly machine: CommentStateMachine;
  private readonly matcher: RegExp;
  private lineNumber = 0;

  constructor(
    private readonly vocabulary: TagVocabulary,
    syntax: LanguageSyntax,
    private readonly file: string,
  ) {
    this.machine = new CommentStateMachine(syntax);
    this.matcher = vocabulary.matcher();
  }

  pushLine(line: string): void {
    this.lineNumber += 1;
    for (const segment of this.machine.feed(line, this.lineNumber)) {
      this.matchSegment(line, segment);
    }
  }

  private matchSegment(line: string, segment: LineSegment): void {
    const text = line.slice(segment.start, segment.end);
    const matcher = this.matcher;
    matcher.lastIndex = 0;

    for (let match = matcher.exec(text); match !== null; match = matcher.exec(text)) {
      const tag = this.vocabulary.canonicalize(match[1]);
      const group = match[2];
      const rest = text.slice(match.index + match[0].length);

      this.findings.push({
        tag,
        custom: this.vocabulary.isCustom(tag),
        message: rest.replace(MESSAGE_LEAD, '').trimEnd(),
        file: this.file,
        line: this.lineNumber,
        column: segment.start + match.index,
        ...(group !== undefined ? parseMetadata(group) : {}),
        contextLine: line,
      });
    }
  }
}

/**
 * Baseline scanner: finds comment spans with a two-state machine and matches the tag
 * vocabulary inside them. Findings come out ordered by line, then column.
 *
 * Tags inside string literals that contain a comment marker (`"// TODO"`) are still reported
 * here; {@link AstCommentVerifier} removes them.
 */
export class CommentExtractor {
  constructor(readonly vocabulary: TagVocabulary = new TagVocabulary()) {}

  /**
   * @throws EncodingError when `content` is not UTF-8 text
   */
  extract(content: Uint8Array | string, syntax: LanguageSyntax, file = ''): Finding[] {
    const run = new ExtractionRun(this.vocabulary, syntax, file);
    for (const line of splitLines(this.toText(content, file))) {
      run.pushLine(line);
    }
    return run.findings;
  }

  async extractLines(lines: LineSource, syntax: LanguageSyntax, file = ''): Promise<Finding[]> {
    const run = new ExtractionRun(this.vocabulary, syntax, file);
    for await (const line of lines) {
      run.pushLine(line);
    }
    return run.findings;
  }

  /** Comment spans only, no tag matching. */
  spans(content: Uint8Array | string, syntax: LanguageSyntax): CommentSpan[] {
    const machine = new CommentStateMachine(syntax);
    splitLines(this.toText(content)).forEach((line, index) => machine.feed(line, index + 1));
    return machine.finish();
  }

  private toText(content: Uint8Array | string, file?: string): string {
    return typeof content === 'string' ? assertText(content, file) : decodeText(content, file);
  }
}
