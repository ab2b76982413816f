/**
 * Tests for query matching.
 */

import { describe, it, expect } from 'vitest';
import { buildGraph } from '../../src/graph/build.js';
import { parseSchema } from '../../src/parser/parser.js';
import { buildIndex } from '../../src/search/indexer.js';
import { normalizeTerms } from '../../src/search/normalize.js';
import { highlightMatches, liveOccurrences, matchQuery, queryTerms } from '../../src/search/query.js';

const MENU = `
type Drink = {name: "Caffe Latte" | LITERAL<"Mocha", ["chocolate"], false>, size?: Size};
type Size = "small" | LITERAL<"grande", [], true>;
`;

describe('matchQuery', () => {
  const index = buildIndex(buildGraph(parseSchema(MENU)));

  it('should match literals sharing a term with the phrase', () => {
    expect(matchQuery(index, 'I want a latte')).toEqual(new Set(['Drink:"Caffe Latte"']));
  });

  it('should ignore case and plurals', () => {
    expect(matchQuery(index, 'two LATTES')).toEqual(new Set(['Drink:"Caffe Latte"']));
  });

  it('should match templates through their aliases', () => {
    expect(matchQuery(index, 'chocolate please')).toEqual(new Set(['Drink:"Mocha"']));
  });

  it('should match cart literals', () => {
    expect(matchQuery(index, '', ['small'])).toEqual(new Set(['Size:"small"']));
    expect(matchQuery(index, 'mocha', ['small'])).toEqual(
      new Set(['Drink:"Mocha"', 'Size:"small"'])
    );
  });

  it('should not add pinned templates to the live set', () => {
    expect(matchQuery(index, '').size).toBe(0);
    expect(matchQuery(index, 'something else entirely').size).toBe(0);
  });
});

describe('queryTerms', () => {
  it('should combine the phrase and cart literals without duplicates', () => {
    const index = buildIndex(buildGraph(parseSchema(MENU)));

    expect(queryTerms(index, 'small latte', ['latte'])).toEqual([
      ...normalizeTerms('small'),
      ...normalizeTerms('latte'),
    ]);
  });

  it('should use the normalization of the index', () => {
    const index = buildIndex(buildGraph(parseSchema(MENU)), { stopWords: true });
    expect(queryTerms(index, 'the latte')).toEqual(normalizeTerms('latte'));
  });
});

describe('liveOccurrences', () => {
  it('should list live occurrences in index order', () => {
    const index = buildIndex(buildGraph(parseSchema(MENU)));
    const occurrences = liveOccurrences(index, matchQuery(index, 'small mocha'));

    expect(occurrences.map((o) => o.key)).toEqual(['Drink:"Mocha"', 'Size:"small"']);
  });
});

describe('highlightMatches', () => {
  const index = buildIndex(buildGraph(parseSchema(MENU)));
  const mark = (word: string) => `[${word}]`;

  it('should mark words sharing a term with the query', () => {
    expect(highlightMatches(index, 'Caffe Latte', queryTerms(index, 'lattes'), mark)).toBe('Caffe [Latte]');
  });

  it('should keep separators as written', () => {
    expect(highlightMatches(index, '"Oat-Milk"', queryTerms(index, 'milk'), mark)).toBe('"Oat-[Milk]"');
  });

  it('should leave text without matches unchanged', () => {
    expect(highlightMatches(index, 'small', queryTerms(index, 'latte'), mark)).toBe('small');
  });

  it('should never mark stop words when the index drops them', () => {
    const filtered = buildIndex(buildGraph(parseSchema(MENU)), { stopWords: true });

    expect(highlightMatches(filtered, 'The Latte', queryTerms(filtered, 'the latte'), mark)).toBe(
      'The [Latte]'
    );
  });
});
