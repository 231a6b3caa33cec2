import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { EncodingError, IoError } from '@tagscan/shared';
import { CommentExtractor } from '../extractor/comment-extractor';
import { LanguageRegistry, type LanguageSyntax } from '../languages/registry';
import { LargeFileReader, inMemorySource } from './large-file-reader';

const registry = new LanguageRegistry();

function syntaxFor(ext: string): LanguageSyntax {
  const syntax = registry.lookup(ext);
  if (!syntax) throw new Error(`no syntax for ${ext}`);
  return syntax;
}

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of iterable) lines.push(line);
  return lines;
}

describe('LargeFileReader', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tagscan-reader-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reads small files whole and large files as a stream', async () => {
    const file = path.join(tmpDir, 'a.ts');
    await fs.writeFile(file, '// TODO: x\n'.repeat(10));

    const small = await new LargeFileReader({ thresholdBytes: 1024 }).open(file);
    expect(small.mode).toBe('buffered');
    expect(small.sizeBytes).toBe(110);

    const large = await new LargeFileReader({ thresholdBytes: 100 }).open(file);
    expect(large.mode).toBe('streamed');
  });

  it('uses a 256 KiB default threshold', () => {
    expect(new LargeFileReader().thresholdBytes).toBe(262144);
  });

  it('yields identical lines and findings on both paths', async () => {
    const body = [
      '/* preamble é ✓',
      ' * TODO(ann, #12): multi-byte ✓ text',
      ' */',
      'const s = "TODO not a comment";\r',
      'x(); // FIXME(p:high): café',
      '/* HACK: inline */ y(); // BUG: last',
    ].join('\n');
    const content = Array.from({ length: 40 }, () => body).join('\n') + '\n';
    const file = path.join(tmpDir, 'big.ts');
    await fs.writeFile(file, content, 'utf8');

    const buffered = await new LargeFileReader({ thresholdBytes: 10_000_000 }).open(file);
    // A 7-byte chunk size splits lines and multi-byte characters across chunks.
    const streamed = await new LargeFileReader({ thresholdBytes: 16, chunkSize: 7 }).open(file);
    expect(streamed.mode).toBe('streamed');

    const bufferedLines = await collect(buffered.lines());
    expect(await collect(streamed.lines())).toEqual(bufferedLines);
    expect(bufferedLines).toHaveLength(240);
    expect(await streamed.text()).toBe(content);

    const extractor = new CommentExtractor();
    const syntax = syntaxFor('ts');
    const fromBuffered = await extractor.extractLines(buffered.lines(), syntax, file);
    const fromStreamed = await extractor.extractLines(streamed.lines(), syntax, file);
    expect(fromStreamed).toEqual(fromBuffered);
    expect(fromBuffered).toHaveLength(160);
    expect(fromBuffered).toEqual(extractor.extract(content, syntax, file));
  });

  it('raises EncodingError for invalid UTF-8 on the streamed path', async () => {
    const file = path.join(tmpDir, 'bad.ts');
    await fs.writeFile(file, Buffer.concat([Buffer.from('// TODO: a\n'.repeat(4)), Buffer.from([0xc3])]));
    const source = await new LargeFileReader({ thresholdBytes: 8, chunkSize: 5 }).open(file);
    await expect(collect(source.lines())).rejects.toBeInstanceOf(EncodingError);
  });

  it('raises EncodingError for NUL bytes on the buffered path', async () => {
    const file = path.join(tmpDir, 'nul.ts');
    await fs.writeFile(file, Buffer.from([0x61, 0x00, 0x62]));
    const source = await new LargeFileReader().open(file);
    await expect(source.text()).rejects.toBeInstanceOf(EncodingError);
  });

  it('raises IoError for missing files', async () => {
    const missing = path.join(tmpDir, 'missing.ts');
    await expect(new LargeFileReader().open(missing)).rejects.toBeInstanceOf(IoError);

    const streamedMissing = await new LargeFileReader({ thresholdBytes: 1 }).open(missing, { sizeBytes: 50 });
    await expect(collect(streamedMissing.lines())).rejects.toBeInstanceOf(IoError);
  });

  it('reports the label as the source path', async () => {
    const file = path.join(tmpDir, 'labelled.ts');
    await fs.writeFile(file, '// TODO: x\n');
    const source = await new LargeFileReader().open(file, { label: 'labelled.ts' });
    expect(source.path).toBe('labelled.ts');
    expect(source.sizeBytes).toBe(11);
  });

  it('wraps in-memory text', async () => {
    const source = inMemorySource('mem.py', '# TODO: a\n# TODO: b');
    expect(source.mode).toBe('memory');
    expect(await collect(source.lines())).toEqual(['# TODO: a', '# TODO: b']);
    expect(await source.text()).toBe('# TODO: a\n# TODO: b');
  });
});
