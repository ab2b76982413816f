/**
 * Graph traversal over declaration references.
 */

import type { TypeGraph } from '../core/types.js';

/**
 * Direction for graph traversal: `downstream` follows references, `upstream`
 * follows the declarations that reference a node.
 */
export type TraversalDirection = 'upstream' | 'downstream' | 'both';

/**
 * Build the reverse edge map: for each declaration, the declarations that
 * reference it, in source order.
 */
export function buildReferrers(graph: TypeGraph): Map<string, string[]> {
  const referrers = new Map<string, string[]>();
  for (const name of graph.order) {
    referrers.set(name, []);
  }
  for (const name of graph.order) {
    for (const target of graph.edges.get(name) ?? []) {
      referrers.get(target)?.push(name);
    }
  }
  return referrers;
}

/**
 * Traverse the graph from a starting declaration and return the names reached,
 * in first-discovery (depth-first preorder) order. Cycle safe.
 */
export function traverseGraph(
  startName: string,
  graph: TypeGraph,
  direction: TraversalDirection = 'downstream',
  maxDepth: number = Infinity
): string[] {
  const visited = new Set<string>();
  const result: string[] = [];
  const referrers = direction === 'downstream' ? undefined : buildReferrers(graph);

  function traverse(name: string, depth: number) {
    if (depth > maxDepth || visited.has(name)) return;
    if (!graph.declarations.has(name)) return;
    visited.add(name);
    result.push(name);

    // Outgoing edges (references made by this declaration)
    if (direction === 'downstream' || direction === 'both') {
      for (const target of graph.edges.get(name) ?? []) {
        traverse(target, depth + 1);
      }
    }

    // Incoming edges (declarations referencing this one)
    if (referrers) {
      for (const source of referrers.get(name) ?? []) {
        traverse(source, depth + 1);
      }
    }
  }

  traverse(startName, 0);
  return result;
}
