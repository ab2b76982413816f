/**
 * Load-once, prune-per-request facade over the parser, indexer and pruner.
 */

import type { TypeGraph } from './core/types.js';
import { buildGraph } from './graph/build.js';
import { parseSchema } from './parser/parser.js';
import { compressGraph } from './prune/compress.js';
import { pruneGraph } from './prune/prune.js';
import { serializeGraph } from './export/serialize.js';
import { collectCartLiterals, type CartValue } from './search/cart.js';
import { buildIndex, type LiteralIndex } from './search/indexer.js';
import type { NormalizeOptions } from './search/normalize.js';
import { matchQuery, type LiveSet } from './search/query.js';

/**
 * A parsed, validated and indexed schema. Immutable; share it freely.
 */
export interface LoadedSchema {
  readonly graph: TypeGraph;
  readonly index: LiteralIndex;
}

export interface ShrinkRequest {
  root: string;
  phrase?: string;
  cart?: CartValue;
  /** Inline forwarding declarations. Defaults to true. */
  compress?: boolean;
  preserveTemplates?: boolean;
}

export interface ShrinkResult {
  graph: TypeGraph;
  text: string;
  live: LiveSet;
}

/**
 * Parse, build and index a schema. Throws the first load-time error.
 */
export function loadSchema(text: string, options: NormalizeOptions = {}): LoadedSchema {
  const graph = buildGraph(parseSchema(text));
  return { graph, index: buildIndex(graph, options) };
}

/**
 * Prune a loaded schema for one request and serialize the result.
 * Throws RootEliminatedError when nothing of the root survives.
 */
export function shrinkSchema(schema: LoadedSchema, request: ShrinkRequest): ShrinkResult {
  const cartLiterals = request.cart === undefined ? [] : collectCartLiterals(request.cart);
  const live = matchQuery(schema.index, request.phrase ?? '', cartLiterals);

  let graph = pruneGraph(schema.graph, schema.index, request.root, live);
  if (request.compress ?? true) {
    graph = compressGraph(graph, request.root);
  }

  const text = serializeGraph(graph, {
    root: request.root,
    preserveTemplates: request.preserveTemplates,
  });
  return { graph, text, live };
}
