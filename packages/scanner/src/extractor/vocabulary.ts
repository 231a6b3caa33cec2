import { ConfigError } from '@tagscan/shared';
import { BUILTIN_TAGS } from '../types';

export interface TagVocabularyOptions {
  /** Defaults to the built-in tags. */
  tags?: readonly string[];
  /** Additional tags; reported with `custom: true` unless they are built-ins. */
  customTags?: readonly string[];
  /** Exact-case matching unless explicitly disabled. */
  caseSensitive?: boolean;
}

const BUILTIN_SET: ReadonlySet<string> = new Set(BUILTIN_TAGS);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * The set of tag keywords the extractor recognises.
 */
export class TagVocabulary {
  readonly tags: readonly string[];
  readonly caseSensitive: boolean;
  private readonly canonical = new Map<string, string>();
  private readonly source: string;

  /**
   * @throws ConfigError for an empty or blank tag name
   */
  constructor(options: TagVocabularyOptions = {}) {
    this.caseSensitive = options.caseSensitive ?? true;
    const ordered: string[] = [];
    for (const tag of [...(options.tags ?? BUILTIN_TAGS), ...(options.customTags ?? [])]) {
      if (tag.trim() === '') {
        throw new ConfigError('Tag names must not be empty');
      }
      const key = this.key(tag);
      if (!this.canonical.has(key)) {
        this.canonical.set(key, tag);
        ordered.push(tag);
      }
    }
    this.tags = Object.freeze(ordered);

    const alternatives = [...ordered].sort((a, b) => b.length - a.length).map(escapeRegExp);
    this.source = alternatives.length
      ? `(?<![A-Za-z0-9_])(${alternatives.join('|')})(?![A-Za-z0-9_])(?:\\(([^)]*)\\))?`
      : '(?!)';
  }

  /**
   * A fresh global matcher. Group 1 is the tag, group 2 the parenthesised field list if any.
   */
  matcher(): RegExp {
    return new RegExp(this.source, this.caseSensitive ? 'g' : 'gi');
  }

  /** Vocabulary spelling for a matched keyword. */
  canonicalize(matched: string): string {
    return this.canonical.get(this.key(matched)) ?? matched;
  }

  isCustom(tag: string): boolean {
    return !BUILTIN_SET.has(tag);
  }

  /** Stable description used to key cached results. */
  describe(): { tags: string[]; caseSensitive: boolean } {
    return { tags: [...this.tags].sort(), caseSensitive: this.caseSensitive };
  }

  private key(tag: string): string {
    return this.caseSensitive ? tag : tag.toUpperCase();
  }
}
