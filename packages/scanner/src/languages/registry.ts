import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@tagscan/shared';
import builtinLanguages from './languages.json';

export const GRAMMARS = ['javascript', 'typescript', 'tsx', 'python', 'go', 'rust'] as const;

export type GrammarId = (typeof GRAMMARS)[number];

const DelimiterSchema = z.string().min(1);

export const LanguageSyntaxSchema = z
  .object({
    name: z.string().min(1),
    extensions: z.array(z.string().min(1)).min(1),
    lineComments: z.array(DelimiterSchema).default([]),
    blockComment: z.object({ open: DelimiterSchema, close: DelimiterSchema }).optional(),
    grammar: z.enum(GRAMMARS).optional(),
  })
  .refine((lang) => lang.lineComments.length > 0 || lang.blockComment !== undefined, {
    message: 'a language needs a line marker or a block delimiter pair',
  });

/**
 * Comment syntax of one language. Block comments do not nest: the first close delimiter ends them.
 */
export interface LanguageSyntax {
  readonly name: string;
  readonly extensions: readonly string[];
  readonly lineComments: readonly string[];
  readonly blockComment?: { readonly open: string; readonly close: string };
  readonly grammar?: GrammarId;
}

/** Unvalidated definition, as read from the built-in table or supplied by a caller. */
export interface LanguageSyntaxInput {
  name: string;
  extensions: readonly string[];
  lineComments?: readonly string[];
  blockComment?: { open: string; close: string };
  grammar?: string;
}

function normalizeExtension(extension: string): string {
  return extension.replace(/^\./, '').toLowerCase();
}

function freeze(input: LanguageSyntaxInput): LanguageSyntax {
  const parsed = LanguageSyntaxSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid language definition "${input.name}": ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  const lang = parsed.data;
  return Object.freeze({
    name: lang.name,
    extensions: Object.freeze(lang.extensions.map(normalizeExtension)),
    lineComments: Object.freeze([...lang.lineComments]),
    blockComment: lang.blockComment ? Object.freeze({ ...lang.blockComment }) : undefined,
    grammar: lang.grammar,
  });
}

/**
 * Extension to comment-syntax table. Built once, never mutated afterwards.
 *
 * Later definitions win when two languages claim the same extension, so callers can
 * override a built-in by passing their own entry in `extra`.
 */
export class LanguageRegistry {
  private readonly byExtension = new Map<string, LanguageSyntax>();
  private readonly all: LanguageSyntax[] = [];

  constructor(extra: readonly LanguageSyntaxInput[] = [], includeBuiltins = true) {
    const inputs: LanguageSyntaxInput[] = includeBuiltins ? [...builtinLanguages, ...extra] : [...extra];
    for (const input of inputs) {
      const syntax = freeze(input);
      this.all.push(syntax);
      for (const ext of syntax.extensions) {
        this.byExtension.set(ext, syntax);
      }
    }
  }

  /** Case-insensitive; the leading dot is optional. */
  lookup(extension: string): LanguageSyntax | undefined {
    return this.byExtension.get(normalizeExtension(extension));
  }

  forPath(filePath: string): LanguageSyntax | undefined {
    const ext = path.extname(filePath);
    return ext ? this.lookup(ext) : undefined;
  }

  languages(): readonly LanguageSyntax[] {
    return this.all;
  }

  extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }
}

let defaultRegistry: LanguageRegistry | undefined;

export function getDefaultRegistry(): LanguageRegistry {
  defaultRegistry ??= new LanguageRegistry();
  return defaultRegistry;
}
