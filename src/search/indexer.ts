/**
 * Inverted index from normalized terms to the string literals of a graph.
 */

import type { TypeExpr, TypeGraph } from '../core/types.js';
import { declarationExprs } from '../graph/build.js';
import { normalizeTerms, type NormalizeOptions } from './normalize.js';

/**
 * One string literal or template, identified by its owning declaration and
 * its value.
 */
export interface Occurrence {
  readonly key: string;
  readonly declaration: string;
  readonly value: string;
  readonly aliases: readonly string[];
  readonly pinned: boolean;
  readonly source: 'literal' | 'template';
  readonly terms: readonly string[];
}

export interface LiteralIndex {
  readonly terms: ReadonlyMap<string, ReadonlySet<string>>;
  readonly occurrences: ReadonlyMap<string, Occurrence>;
  readonly pinned: ReadonlySet<string>;
  /** Normalization used at build time; queries must use the same. */
  readonly options: NormalizeOptions;
}

/**
 * Identity of a literal within a declaration, e.g. `A:"X"`.
 */
export function occurrenceKey(declaration: string, value: string): string {
  return `${declaration}:${JSON.stringify(value)}`;
}

interface Entry {
  declaration: string;
  value: string;
  aliases: string[];
  pinned: boolean;
  source: 'literal' | 'template';
}

function collect(expr: TypeExpr, declaration: string, entries: Map<string, Entry>) {
  switch (expr.kind) {
    case 'literal':
      if (typeof expr.value === 'string') {
        const key = occurrenceKey(declaration, expr.value);
        if (!entries.has(key)) {
          entries.set(key, {
            declaration,
            value: expr.value,
            aliases: [],
            pinned: false,
            source: 'literal',
          });
        }
      }
      return;
    case 'template': {
      const key = occurrenceKey(declaration, expr.label);
      const existing = entries.get(key);
      if (existing) {
        // Same label written twice in one declaration: merge
        for (const alias of expr.aliases) {
          if (!existing.aliases.includes(alias)) existing.aliases.push(alias);
        }
        existing.pinned = existing.pinned || expr.pinned;
        existing.source = 'template';
      } else {
        entries.set(key, {
          declaration,
          value: expr.label,
          aliases: [...expr.aliases],
          pinned: expr.pinned,
          source: 'template',
        });
      }
      return;
    }
    case 'reference':
      for (const arg of expr.args) collect(arg, declaration, entries);
      return;
    case 'union':
      for (const member of expr.members) collect(member, declaration, entries);
      return;
    case 'struct':
      for (const field of expr.fields) collect(field.type, declaration, entries);
      return;
    case 'array':
      collect(expr.element, declaration, entries);
      return;
    default:
      return;
  }
}

/**
 * Build the literal index for a graph. Each declaration is visited once,
 * constraints included.
 */
export function buildIndex(graph: TypeGraph, options: NormalizeOptions = {}): LiteralIndex {
  const visited = new Set<string>();
  const entries = new Map<string, Entry>();

  for (const name of graph.order) {
    if (visited.has(name)) continue;
    visited.add(name);
    const decl = graph.declarations.get(name);
    if (!decl) continue;
    for (const expr of declarationExprs(decl)) {
      collect(expr, name, entries);
    }
  }

  const terms = new Map<string, Set<string>>();
  const occurrences = new Map<string, Occurrence>();
  const pinned = new Set<string>();

  for (const [key, entry] of entries) {
    const occurrenceTerms: string[] = [];
    for (const text of [entry.value, ...entry.aliases]) {
      for (const term of normalizeTerms(text, options)) {
        if (!occurrenceTerms.includes(term)) occurrenceTerms.push(term);
      }
    }

    for (const term of occurrenceTerms) {
      let keys = terms.get(term);
      if (!keys) {
        keys = new Set();
        terms.set(term, keys);
      }
      keys.add(key);
    }

    if (entry.pinned) pinned.add(key);
    occurrences.set(key, { key, ...entry, terms: occurrenceTerms });
  }

  return { terms, occurrences, pinned, options };
}
