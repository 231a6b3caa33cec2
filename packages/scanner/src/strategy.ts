import type { LanguageSyntax } from './languages/registry';
import type { SourceContent } from './reader/large-file-reader';
import type { Finding, PrecisionCounters, ScanWarning } from './types';
import { CommentExtractor } from './extractor/comment-extractor';
import { TagVocabulary } from './extractor/vocabulary';
import { AstCommentVerifier } from './verifier/ast-verifier';

export interface StrategyResult {
  findings: Finding[];
  warnings: ScanWarning[];
  /** Present only for strategies that filter candidates */
  precision?: PrecisionCounters;
}

/**
 * "Produce findings for this content." Implementations must be safe to call concurrently
 * for different files.
 */
export interface ExtractionStrategy {
  readonly name: string;
  /** Everything that changes the output for identical input; part of the cache key. */
  profile(): Record<string, unknown>;
  extract(source: SourceContent, syntax: LanguageSyntax): Promise<StrategyResult>;
}

export class BaselineStrategy implements ExtractionStrategy {
  readonly name = 'baseline';
  readonly extractor: CommentExtractor;

  constructor(vocabulary: TagVocabulary = new TagVocabulary()) {
    this.extractor = new CommentExtractor(vocabulary);
  }

  profile(): Record<string, unknown> {
    return { strategy: this.name, vocabulary: this.extractor.vocabulary.describe() };
  }

  async extract(source: SourceContent, syntax: LanguageSyntax): Promise<StrategyResult> {
    const findings = await this.extractor.extractLines(source.lines(), syntax, source.path);
    return { findings, warnings: [] };
  }
}

/**
 * Baseline candidates filtered through the syntax tree. Languages without a grammar keep
 * the streamed baseline path and count as a fallback.
 */
export class AstVerifiedStrategy implements ExtractionStrategy {
  readonly name = 'ast';

  constructor(
    private readonly baseline: BaselineStrategy = new BaselineStrategy(),
    private readonly verifier: AstCommentVerifier = new AstCommentVerifier(),
  ) {}

  profile(): Record<string, unknown> {
    return { ...this.baseline.profile(), strategy: this.name };
  }

  async extract(source: SourceContent, syntax: LanguageSyntax): Promise<StrategyResult> {
    if (!this.verifier.supports(syntax)) {
      const { findings } = await this.baseline.extract(source, syntax);
      return {
        findings,
        warnings: [],
        precision: {
          candidates: findings.length,
          kept: findings.length,
          discarded: 0,
          fallbacks: 1,
        },
      };
    }

    const text = await source.text();
    const candidates = this.baseline.extractor.extract(text, syntax, source.path);
    const result = this.verifier.verify(text, syntax, candidates);

    return {
      findings: result.findings,
      warnings: result.fallback
        ? [{ file: source.path, code: result.fallback.code, message: result.fallback.reason }]
        : [],
      precision: result.counters,
    };
  }
}

export type StrategyMode = 'baseline' | 'ast';

export function createStrategy(mode: StrategyMode, vocabulary?: TagVocabulary): ExtractionStrategy {
  const baseline = new BaselineStrategy(vocabulary);
  return mode === 'ast' ? new AstVerifiedStrategy(baseline) : baseline;
}
