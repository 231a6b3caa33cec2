import { describe, it, expect, vi } from 'vitest';
import { LanguageRegistry, type LanguageSyntax } from '../languages/registry';
import { CommentExtractor } from '../extractor/comment-extractor';
import { AstCommentVerifier } from './ast-verifier';
import { ParserPool, isCommentNode } from './grammars';

const registry = new LanguageRegistry();
const extractor = new CommentExtractor();

function syntaxFor(ext: string): LanguageSyntax {
  const syntax = registry.lookup(ext);
  if (!syntax) throw new Error(`no syntax for ${ext}`);
  return syntax;
}

function verifyWith(verifier: AstCommentVerifier, content: string, ext: string) {
  const syntax = syntaxFor(ext);
  const candidates = extractor.extract(content, syntax, `sample.${ext}`);
  return { candidates, result: verifier.verify(content, syntax, candidates) };
}

describe('AstCommentVerifier', () => {
  const verifier = new AstCommentVerifier();

  it('drops JavaScript string and template literal false positives', () => {
    const content = [
      'const a = "// TODO: in a string";',
      '// FIXME: real one',
      'const b = `/* HACK: template */`;',
      '/* BUG: real block */',
    ].join('\n');
    const { candidates, result } = verifyWith(verifier, content, 'js');

    expect(candidates.map((f) => f.tag)).toEqual(['TODO', 'FIXME', 'HACK', 'BUG']);
    expect(result.findings.map((f) => [f.tag, f.line])).toEqual([
      ['FIXME', 2],
      ['BUG', 4],
    ]);
    expect(result.counters).toEqual({ candidates: 4, kept: 2, discarded: 2, fallbacks: 0 });
    expect(result.fallback).toBeUndefined();
  });

  it('drops Rust string false positives', () => {
    const content = [
      'fn main() {',
      '    let s = "// TODO: in a string";',
      '    // TODO: real',
      '    /* XXX: block */',
      '}',
    ].join('\n');
    const { candidates, result } = verifyWith(verifier, content, 'rs');

    expect(candidates).toHaveLength(3);
    expect(result.findings.map((f) => [f.line, f.message])).toEqual([
      [3, 'real'],
      [4, 'block'],
    ]);
  });

  it('drops Python string false positives', () => {
    const content = 's = "# TODO: in string"\n# TODO: real\n';
    const { result } = verifyWith(verifier, content, 'py');
    expect(result.findings.map((f) => f.line)).toEqual([2]);
  });

  it('drops Go string false positives', () => {
    const content = 'package main\n\nvar s = "// BUG: no"\n\n// BUG: yes\n';
    const { result } = verifyWith(verifier, content, 'go');
    expect(result.findings.map((f) => f.message)).toEqual(['yes']);
  });

  it('uses the TSX grammar for .tsx files', () => {
    const content = [
      'const s = "// TODO: no";',
      'export const el = <div>{/* TODO: jsx comment */}</div>;',
    ].join('\n');
    const { result } = verifyWith(verifier, content, 'tsx');
    expect(result.findings.map((f) => f.message)).toEqual(['jsx comment']);
  });

  it('measures columns in UTF-16 code units', () => {
    const content = 'const s = "é😀 // TODO: no"; // TODO: yes\n';
    const { candidates, result } = verifyWith(verifier, content, 'ts');
    expect(candidates).toHaveLength(2);
    expect(result.findings.map((f) => f.message)).toEqual(['yes']);
  });

  it('never adds findings', () => {
    const content = '// TODO: a\nlet x = 1; // FIXME: b\n';
    const { candidates, result } = verifyWith(verifier, content, 'ts');
    expect(result.findings).toEqual(candidates);
    for (const finding of result.findings) {
      expect(candidates).toContain(finding);
    }
  });

  it('fails open when the language has no grammar', () => {
    const content = 'String s = "// TODO: in string"; // TODO: real';
    const { candidates, result } = verifyWith(verifier, content, 'java');
    expect(result.findings).toBe(candidates);
    expect(result.counters).toEqual({ candidates: 2, kept: 2, discarded: 0, fallbacks: 1 });
    expect(result.fallback).toEqual({
      code: 'NO_GRAMMAR',
      reason: 'No syntax tree grammar for Java',
    });
    expect(verifier.supports(syntaxFor('java'))).toBe(false);
    expect(verifier.supports(syntaxFor('rs'))).toBe(true);
  });

  it('fails open when parsing throws', () => {
    const pool = new ParserPool();
    const parser = pool.get('javascript');
    if (!parser) throw new Error('javascript grammar unavailable');
    vi.spyOn(parser, 'parse').mockImplementation(() => {
      throw new Error('boom');
    });

    const { candidates, result } = verifyWith(
      new AstCommentVerifier(pool),
      'const a = "// TODO: kept anyway";',
      'js',
    );
    expect(result.findings).toBe(candidates);
    expect(result.fallback).toEqual({
      code: 'PARSE_FALLBACK',
      reason: 'Parsing JavaScript failed: boom',
    });
  });

  it('skips parsing when there are no candidates', () => {
    const { result } = verifyWith(verifier, 'const a = 1;', 'js');
    expect(result).toEqual({
      findings: [],
      counters: { candidates: 0, kept: 0, discarded: 0, fallbacks: 0 },
    });
  });
});

describe('isCommentNode', () => {
  it('matches the comment node types of the bundled grammars', () => {
    expect(isCommentNode('comment')).toBe(true);
    expect(isCommentNode('line_comment')).toBe(true);
    expect(isCommentNode('block_comment')).toBe(true);
    expect(isCommentNode('string')).toBe(false);
    expect(isCommentNode('commentary')).toBe(false);
  });
});
