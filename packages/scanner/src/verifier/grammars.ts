import Parser from 'tree-sitter';
import treeSitterTypeScript from 'tree-sitter-typescript';
import treeSitterJavaScript from 'tree-sitter-javascript';
import treeSitterPython from 'tree-sitter-python';
import treeSitterGo from 'tree-sitter-go';
import treeSitterRust from 'tree-sitter-rust';
import type { GrammarId } from '../languages/registry';

type TreeSitterLanguage = NonNullable<Parameters<Parser['setLanguage']>[0]>;

const grammarModules: Record<GrammarId, { module: unknown; key?: string }> = {
  javascript: { module: treeSitterJavaScript },
  typescript: { module: treeSitterTypeScript, key: 'typescript' },
  tsx: { module: treeSitterTypeScript, key: 'tsx' },
  python: { module: treeSitterPython },
  go: { module: treeSitterGo },
  rust: { module: treeSitterRust },
};

function isLanguage(value: unknown): value is TreeSitterLanguage {
  return typeof value === 'object' && value !== null && 'language' in value;
}

/**
 * Grammar packages export either the language binding itself or, for TypeScript,
 * an object holding one binding per dialect.
 */
function resolveLanguage(id: GrammarId): TreeSitterLanguage | undefined {
  const { module, key } = grammarModules[id];
  if (key !== undefined && typeof module === 'object' && module !== null && key in module) {
    const nested: unknown = Reflect.get(module, key);
    return isLanguage(nested) ? nested : undefined;
  }
  return isLanguage(module) ? module : undefined;
}

/**
 * One parser per grammar, created on first use.
 */
export class ParserPool {
  private readonly parsers = new Map<GrammarId, Parser | null>();

  constructor(private readonly timeoutMicros = 500_000) {}

  get(id: GrammarId): Parser | undefined {
    if (!this.parsers.has(id)) {
      this.parsers.set(id, this.create(id));
    }
    return this.parsers.get(id) ?? undefined;
  }

  private create(id: GrammarId): Parser | null {
    const language = resolveLanguage(id);
    if (!language) {
      return null;
    }
    try {
      const parser = new Parser();
      parser.setLanguage(language);
      parser.setTimeoutMicros(this.timeoutMicros);
      return parser;
    } catch {
      // Native binding mismatch: the verifier falls back for this grammar.
      return null;
    }
  }
}

/** Comment node types across the bundled grammars (`comment`, `line_comment`, `block_comment`). */
export function isCommentNode(type: string): boolean {
  return type === 'comment' || type.endsWith('_comment');
}

export interface ByteRange {
  start: number;
  end: number;
}

/**
 * Collects comment node ranges in document order without descending into comments.
 * Offsets are UTF-16 code-unit indices into the parsed string.
 */
export function collectCommentRanges(tree: Parser.Tree): ByteRange[] {
  const ranges: ByteRange[] = [];
  const cursor = tree.walk();

  while (true) {
    if (isCommentNode(cursor.nodeType)) {
      ranges.push({ start: cursor.startIndex, end: cursor.endIndex });
    } else if (cursor.gotoFirstChild()) {
      continue;
    }

    while (true) {
      if (cursor.gotoNextSibling()) {
        break;
      }
      if (!cursor.gotoParent()) {
        return ranges;
      }
    }
  }
}
