import type { EntitySet } from '../../domain/entities/index.js';

const AUTHOR_PATTERNS = [/\b[A-Z][a-z]+ [A-Z][a-z]+\b/g, /\b[A-Z]\. [A-Z][a-z]+\b/g];
const KEYWORD_PATTERN = /\b[A-Z][a-z]{3,}\b|\b[a-z]{5,}\b/g;

const allMatches = (pattern: RegExp, text: string): string[] =>
  Array.from(text.matchAll(pattern), match => match[0]);

/**
 * Pulls coarse entities out of a raw question. Author candidates are
 * `Firstname Lastname` matches followed by `F. Lastname` matches; duplicates
 * are kept. Concepts only come from the caller.
 */
export const extractEntities = (query: string, concepts: string[] = []): EntitySet => ({
  authors: AUTHOR_PATTERNS.flatMap(pattern => allMatches(pattern, query)),
  concepts: [...concepts],
  keywords: allMatches(KEYWORD_PATTERN, query),
});
