/**
 * Query matching: which indexed literals are relevant to the current turn.
 */

import type { LiteralIndex, Occurrence } from './indexer.js';
import { WORD_SEPARATOR, normalizeTerms, wordTerm } from './normalize.js';

/**
 * Occurrence keys considered relevant to a query.
 */
export type LiveSet = ReadonlySet<string>;

/**
 * Normalized terms of a phrase and a list of cart literals, using the
 * normalization the index was built with.
 */
export function queryTerms(
  index: LiteralIndex,
  phrase: string,
  cartLiterals: readonly string[] = []
): string[] {
  const terms: string[] = [];
  for (const text of [phrase, ...cartLiterals]) {
    for (const term of normalizeTerms(text, index.options)) {
      if (!terms.includes(term)) terms.push(term);
    }
  }
  return terms;
}

/**
 * Compute the live set: every occurrence with at least one term (from its
 * value or, for templates, its aliases) equal to a query term.
 */
export function matchQuery(
  index: LiteralIndex,
  phrase: string,
  cartLiterals: readonly string[] = []
): LiveSet {
  const live = new Set<string>();
  for (const term of queryTerms(index, phrase, cartLiterals)) {
    for (const key of index.terms.get(term) ?? []) {
      live.add(key);
    }
  }
  return live;
}

/**
 * Resolve a live set to its occurrences, in index order.
 */
export function liveOccurrences(index: LiteralIndex, live: LiveSet): Occurrence[] {
  return Array.from(index.occurrences.values()).filter((occurrence) => live.has(occurrence.key));
}

/**
 * Wrap every word of `text` whose term is one of `terms` with `mark`,
 * leaving separators and other words as written.
 */
export function highlightMatches(
  index: LiteralIndex,
  text: string,
  terms: readonly string[],
  mark: (word: string) => string
): string {
  const separator = new RegExp(`(${WORD_SEPARATOR.source})`, WORD_SEPARATOR.flags);
  return text
    .split(separator)
    .map((part, i) => {
      if (i % 2 === 1 || part.length === 0) return part;
      const term = wordTerm(part, index.options);
      return term !== undefined && terms.includes(term) ? mark(part) : part;
    })
    .join('');
}
