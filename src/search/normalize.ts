/**
 * Term normalization shared by the literal indexer and the query matcher.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { stemmer } from 'stemmer';

export interface NormalizeOptions {
  /** Drop common English words listed in data/stopwords.json. */
  stopWords?: boolean;
}

export const WORD_SEPARATOR = /[^\p{L}\p{M}\p{N}]+/u;

let stopWordSet: ReadonlySet<string> | undefined;

/**
 * Locate a file under the package's data/ directory, from either the
 * sources or the build output.
 */
function findDataFile(name: string): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    const candidate = join(dir, 'data', name);
    if (existsSync(candidate)) return candidate;
    if (dir === dirname(dir)) {
      throw new Error(`Data file not found: ${name}`);
    }
    dir = dirname(dir);
  }
}

/**
 * Load the stop word list shipped with the package.
 */
export function loadStopWords(): ReadonlySet<string> {
  if (!stopWordSet) {
    const content = readFileSync(findDataFile('stopwords.json'), 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed) || !parsed.every((word): word is string => typeof word === 'string')) {
      throw new Error('data/stopwords.json must be an array of strings');
    }
    stopWordSet = new Set(parsed);
  }
  return stopWordSet;
}

/**
 * Split text into lowercase words.
 */
export function splitWords(text: string): string[] {
  return text
    .normalize('NFC')
    .toLowerCase()
    .split(WORD_SEPARATOR)
    .filter((word) => word.length > 0);
}

/**
 * Term of a single word, or undefined for a stop word.
 */
export function wordTerm(word: string, options: NormalizeOptions = {}): string | undefined {
  const lower = word.normalize('NFC').toLowerCase();
  if (options.stopWords && loadStopWords().has(lower)) return undefined;
  return stemmer(lower);
}

/**
 * Normalize text into distinct stemmed terms, in order of first appearance.
 * The input is never modified.
 */
export function normalizeTerms(text: string, options: NormalizeOptions = {}): string[] {
  const terms: string[] = [];
  for (const word of splitWords(text)) {
    const term = wordTerm(word, options);
    if (term !== undefined && !terms.includes(term)) terms.push(term);
  }
  return terms;
}
