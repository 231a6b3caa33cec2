import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { IoError } from '@tagscan/shared';
import { openFingerprintCache, type FingerprintCache } from './cache/fingerprint-cache';
import { LanguageRegistry, type LanguageSyntax } from './languages/registry';
import { LargeFileReader } from './reader/large-file-reader';
import { BaselineStrategy } from './strategy';
import { IncrementalScanner } from './incremental';

const registry = new LanguageRegistry();

function syntaxFor(ext: string): LanguageSyntax {
  const syntax = registry.lookup(ext);
  if (!syntax) throw new Error(`no syntax for ${ext}`);
  return syntax;
}

describe('IncrementalScanner', () => {
  let root: string;
  let cache: FingerprintCache;
  let reader: LargeFileReader;
  let scanner: IncrementalScanner;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tagscan-incremental-'));
    const strategy = new BaselineStrategy();
    cache = openFingerprintCache({ dbPath: path.join(root, '.tagscan', 'cache.db'), profile: strategy.profile() });
    reader = new LargeFileReader();
    scanner = new IncrementalScanner({ strategy, cache, reader, root });
  });

  afterEach(async () => {
    cache.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('answers an unchanged file from the cache without reading it', async () => {
    await fs.writeFile(path.join(root, 'a.ts'), '// TODO: first\n');
    const openSpy = vi.spyOn(reader, 'open');

    const first = await scanner.scanFile('a.ts', syntaxFor('ts'));
    const second = await scanner.scanFile('a.ts', syntaxFor('ts'));

    expect(first.fromCache).toBe(false);
    expect(second.fromCache).toBe(true);
    expect(second.findings).toEqual(first.findings);
    expect(first.findings.map((f) => [f.file, f.message])).toEqual([['a.ts', 'first']]);
    expect(openSpy).toHaveBeenCalledTimes(1);
  });

  it('rescans and overwrites the entry when the size changes', async () => {
    const file = path.join(root, 'a.ts');
    await fs.writeFile(file, '// TODO: first\n');
    await scanner.scanFile('a.ts', syntaxFor('ts'));

    await fs.writeFile(file, '// TODO: first\n// FIXME: second\n');
    const result = await scanner.scanFile('a.ts', syntaxFor('ts'));

    expect(result.fromCache).toBe(false);
    expect(result.findings.map((f) => f.tag)).toEqual(['TODO', 'FIXME']);
    expect(cache.get('a.ts')?.findings).toEqual(result.findings);
    expect(cache.get('a.ts')?.fingerprint.sizeBytes).toBe(32);
  });

  it('rescans when only the mtime changes', async () => {
    const file = path.join(root, 'a.ts');
    await fs.writeFile(file, '// TODO: aaaa\n');
    await scanner.scanFile('a.ts', syntaxFor('ts'));

    await fs.writeFile(file, '// TODO: bbbb\n');
    const later = new Date('2030-01-01T00:00:00Z');
    await fs.utimes(file, later, later);
    const result = await scanner.scanFile('a.ts', syntaxFor('ts'));

    expect(result.fromCache).toBe(false);
    expect(result.findings.map((f) => f.message)).toEqual(['bbbb']);
  });

  it('always reads without a cache', async () => {
    await fs.writeFile(path.join(root, 'a.py'), '# HACK: x\n');
    const uncached = new IncrementalScanner({ strategy: new BaselineStrategy(), root });

    await uncached.scanFile('a.py', syntaxFor('py'));
    const again = await uncached.scanFile('a.py', syntaxFor('py'));
    expect(again.fromCache).toBe(false);
    expect(again.findings).toHaveLength(1);
  });

  it('raises IoError for missing files and directories', async () => {
    await fs.mkdir(path.join(root, 'dir.ts'));
    await expect(scanner.scanFile('missing.ts', syntaxFor('ts'))).rejects.toBeInstanceOf(IoError);
    await expect(scanner.scanFile('dir.ts', syntaxFor('ts'))).rejects.toThrow('Not a regular file: dir.ts');
  });
});
