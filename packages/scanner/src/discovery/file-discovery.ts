import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import { IoError } from '@tagscan/shared';
import type { LanguageRegistry } from '../languages/registry';
import { isBinaryFile } from './binary';

export const DEFAULT_IGNORES = [
  '.git',
  'node_modules',
  'dist',
  'build',
  'out',
  'target',
  'vendor',
  'coverage',
  '.next',
  '.tagscan',
];

export const IGNORE_FILE = '.tagscanignore';

export interface DiscoveryOptions {
  /** Extra gitignore-style patterns */
  exclude?: readonly string[];
  respectGitignore?: boolean;
  /** Files above this size are left out with a warning */
  maxFileSizeBytes?: number;
  /** When set, only files whose extension the registry knows are listed */
  registry?: LanguageRegistry;
}

export interface DiscoveredFile {
  /** Root-relative, forward slashes */
  path: string;
  absPath: string;
  sizeBytes: number;
}

export interface DiscoveryResult {
  root: string;
  files: DiscoveredFile[];
  warnings: string[];
}

type Fs = typeof nodeFs;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Walks a directory tree and lists the files worth scanning, sorted by relative path.
 */
export class FileDiscovery {
  constructor(private readonly fs: Fs = nodeFs) {}

  async discover(root: string, options: DiscoveryOptions = {}): Promise<DiscoveryResult> {
    const repoRoot = path.resolve(root);
    const files: DiscoveredFile[] = [];
    const warnings: string[] = [];
    const ig = await this.buildIgnore(repoRoot, options, warnings);

    const walk = async (dir: string, relativeDir: string): Promise<void> => {
      let entries;
      try {
        entries = await this.fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (relativeDir === '') {
          throw new IoError(repoRoot, `Cannot read directory ${repoRoot}: ${reasonOf(error)}`, {
            cause: error,
          });
        }
        warnings.push(`Skipping unreadable directory: ${relativeDir}`);
        return;
      }

      for (const entry of entries) {
        const relPath = relativeDir ? path.posix.join(relativeDir, entry.name) : entry.name;
        const absPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
          if (!ig.ignores(`${relPath}/`)) {
            await walk(absPath, relPath);
          }
          continue;
        }
        if (!entry.isFile() || ig.ignores(relPath)) continue;
        if (options.registry && !options.registry.forPath(relPath)) continue;

        let sizeBytes: number;
        let binary: boolean;
        try {
          sizeBytes = (await this.fs.stat(absPath)).size;
          if (options.maxFileSizeBytes !== undefined && sizeBytes > options.maxFileSizeBytes) {
            warnings.push(`Skipping large file: ${relPath} (${sizeBytes} bytes)`);
            continue;
          }
          binary = await isBinaryFile(absPath, this.fs);
        } catch (error) {
          // ENOENT here means the file went away after the listing
          if (!isMissing(error)) {
            warnings.push(`Skipping unreadable file: ${relPath} (${reasonOf(error)})`);
          }
          continue;
        }
        if (binary) continue;

        files.push({ path: relPath, absPath, sizeBytes });
      }
    };

    await walk(repoRoot, '');
    files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    return { root: repoRoot, files, warnings };
  }

  private async buildIgnore(
    root: string,
    options: DiscoveryOptions,
    warnings: string[],
  ): Promise<ReturnType<typeof ignore>> {
    const ig = ignore().add(DEFAULT_IGNORES);
    if (options.respectGitignore ?? true) {
      ig.add(await this.readIgnoreFile(path.join(root, '.gitignore'), warnings));
    }
    ig.add(await this.readIgnoreFile(path.join(root, IGNORE_FILE), warnings));
    if (options.exclude && options.exclude.length > 0) {
      ig.add([...options.exclude]);
    }
    return ig;
  }

  private async readIgnoreFile(filePath: string, warnings: string[]): Promise<string> {
    try {
      return await this.fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (!isMissing(error)) {
        warnings.push(`Ignoring unreadable ${path.basename(filePath)} (${reasonOf(error)})`);
      }
      return '';
    }
  }
}
