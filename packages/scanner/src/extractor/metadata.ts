import type { Priority } from '../types';

export interface TagMetadata {
  author?: string;
  issue?: string;
  priority?: Priority;
}

const PRIORITY_ALIASES: Record<string, Priority> = {
  low: 'low',
  p3: 'low',
  medium: 'medium',
  med: 'medium',
  p2: 'medium',
  high: 'high',
  p1: 'high',
  critical: 'critical',
  crit: 'critical',
  p0: 'critical',
};

const ISSUE_KEY = /^[A-Z][A-Z0-9]+-\d+$/;
const AUTHOR = /^@?([A-Za-z_][\w.-]*)$/;

export function parsePriority(token: string): Priority | undefined {
  const lowered = token.trim().toLowerCase();
  const level = lowered.startsWith('p:') ? lowered.slice(2).trim() : lowered;
  return Object.prototype.hasOwnProperty.call(PRIORITY_ALIASES, level)
    ? PRIORITY_ALIASES[level]
    : undefined;
}

/**
 * Classifies the comma-separated fields of `TAG(...)`. Order does not matter; the first
 * field of each kind wins and unrecognised fields are dropped.
 */
export function parseMetadata(group: string): TagMetadata {
  const metadata: TagMetadata = {};

  for (const raw of group.split(',')) {
    const field = raw.trim();
    if (!field) continue;

    if (field.startsWith('#')) {
      const issue = field.slice(1).trim();
      if (issue) metadata.issue ??= issue;
      continue;
    }
    if (ISSUE_KEY.test(field)) {
      metadata.issue ??= field;
      continue;
    }

    const priority = parsePriority(field);
    if (priority) {
      metadata.priority ??= priority;
      continue;
    }

    const author = AUTHOR.exec(field);
    if (author) {
      metadata.author ??= author[1];
    }
  }

  return metadata;
}
