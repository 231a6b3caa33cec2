import { ParseError } from '@tagscan/shared';
import type { LanguageSyntax } from '../languages/registry';
import type { Finding, PrecisionCounters, ScanWarningCode } from '../types';
import { ParserPool, collectCommentRanges, type ByteRange } from './grammars';

export interface VerificationResult {
  findings: Finding[];
  counters: PrecisionCounters;
  /** Set when candidates were returned unfiltered */
  fallback?: { code: ScanWarningCode; reason: string };
}

export function emptyCounters(): PrecisionCounters {
  return { candidates: 0, kept: 0, discarded: 0, fallbacks: 0 };
}

function computeLineStarts(content: string): number[] {
  const starts = [0];
  for (let i = content.indexOf('\n'); i !== -1; i = content.indexOf('\n', i + 1)) {
    starts.push(i + 1);
  }
  return starts;
}

function insideAny(ranges: readonly ByteRange[], offset: number): boolean {
  let lo = 0;
  let hi = ranges.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const range = ranges[mid];
    if (offset < range.start) {
      hi = mid - 1;
    } else if (offset >= range.end) {
      lo = mid + 1;
    } else {
      return true;
    }
  }
  return false;
}

/**
 * Keeps only candidates whose position falls inside a comment node of the real syntax tree.
 *
 * Fails open: with no grammar for the language, or when parsing throws or times out, the
 * candidates come back untouched and `fallback` says why. Never adds findings.
 */
export class AstCommentVerifier {
  constructor(private readonly parsers: ParserPool = new ParserPool()) {}

  supports(syntax: LanguageSyntax): boolean {
    return syntax.grammar !== undefined && this.parsers.get(syntax.grammar) !== undefined;
  }

  verify(content: string, syntax: LanguageSyntax, candidates: Finding[]): VerificationResult {
    const parser = syntax.grammar ? this.parsers.get(syntax.grammar) : undefined;
    if (!parser) {
      return this.fallBack(candidates, 'NO_GRAMMAR', `No syntax tree grammar for ${syntax.name}`);
    }
    if (candidates.length === 0) {
      return { findings: [], counters: emptyCounters() };
    }

    let ranges: ByteRange[];
    try {
      const tree = parser.parse(content, undefined, { bufferSize: content.length + 1 });
      if (!tree) {
        throw new ParseError(`Parsing ${syntax.name} timed out`);
      }
      ranges = collectCommentRanges(tree);
    } catch (error) {
      const reason =
        error instanceof ParseError
          ? error.message
          : `Parsing ${syntax.name} failed: ${error instanceof Error ? error.message : String(error)}`;
      return this.fallBack(candidates, 'PARSE_FALLBACK', reason);
    }

    const lineStarts = computeLineStarts(content);
    const findings = candidates.filter((candidate) => {
      const lineStart = lineStarts[candidate.line - 1];
      return lineStart !== undefined && insideAny(ranges, lineStart + candidate.column);
    });

    return {
      findings,
      counters: {
        candidates: candidates.length,
        kept: findings.length,
        discarded: candidates.length - findings.length,
        fallbacks: 0,
      },
    };
  }

  private fallBack(
    candidates: Finding[],
    code: ScanWarningCode,
    reason: string,
  ): VerificationResult {
    return {
      findings: candidates,
      counters: {
        candidates: candidates.length,
        kept: candidates.length,
        discarded: 0,
        fallbacks: 1,
      },
      fallback: { code, reason },
    };
  }
}
