/**
 * Path compression: inline declarations that only forward to another type.
 *
 * Every rewrite here is an exact equivalence; the set of accepted values
 * does not change.
 */

import type { Declaration, ReferenceType, TypeExpr, TypeGraph, TypeParam } from '../core/types.js';
import { assembleGraph, declarationExprs, forEachReference } from '../graph/build.js';
import { traverseGraph } from '../graph/traverse.js';
import { mapReferences, propagateNever } from './rewrite.js';

/**
 * Replace parameter uses with the given arguments.
 */
export function substituteParams(
  expr: TypeExpr,
  binding: ReadonlyMap<string, TypeExpr>
): TypeExpr {
  switch (expr.kind) {
    case 'param':
      return binding.get(expr.name) ?? expr;
    case 'reference':
      return { ...expr, args: expr.args.map((arg) => substituteParams(arg, binding)) };
    case 'union':
      return {
        kind: 'union',
        members: expr.members.flatMap((member) => {
          const substituted = substituteParams(member, binding);
          return substituted.kind === 'union' ? substituted.members : [substituted];
        }),
      };
    case 'struct':
      return {
        kind: 'struct',
        fields: expr.fields.map((field) => ({ ...field, type: substituteParams(field.type, binding) })),
      };
    case 'array':
      return { kind: 'array', element: substituteParams(expr.element, binding) };
    default:
      return expr;
  }
}

function rewriteDeclaration(
  decl: Declaration,
  rewrite: (ref: ReferenceType) => TypeExpr
): Declaration {
  const body = mapReferences(decl.body, rewrite);
  const params: TypeParam[] = decl.params.map((param) => {
    if (!param.constraint) return param;
    const constraint = mapReferences(param.constraint, rewrite);
    return constraint === param.constraint ? param : { ...param, constraint };
  });
  const unchanged = body === decl.body && params.every((param, i) => param === decl.params[i]);
  return unchanged ? decl : { ...decl, params, body };
}

/**
 * Find a declaration to inline, returning the rewrite that removes it.
 */
function findInlining(
  declarations: ReadonlyMap<string, Declaration>,
  root: string
): { name: string; rewrite: (ref: ReferenceType) => TypeExpr } | undefined {
  // Aliases: `type D = E<...>` with no parameters of its own
  for (const decl of declarations.values()) {
    if (decl.name === root || decl.params.length > 0 || decl.hints.length > 0) continue;
    const body = decl.body;
    if (body.kind !== 'reference' || body.name === decl.name) continue;
    return {
      name: decl.name,
      rewrite: (ref) => (ref.name === decl.name ? body : ref),
    };
  }

  // Generic declarations used exactly once whose instantiation is a literal or struct
  const sites = new Map<string, ReferenceType[]>();
  for (const decl of declarations.values()) {
    for (const expr of declarationExprs(decl)) {
      forEachReference(expr, (name, args) => {
        const list = sites.get(name) ?? [];
        list.push({ kind: 'reference', name, args });
        sites.set(name, list);
      });
    }
  }

  for (const decl of declarations.values()) {
    if (decl.name === root || decl.params.length === 0 || decl.hints.length > 0) continue;
    const uses = sites.get(decl.name) ?? [];
    if (uses.length !== 1) continue;

    const own: string[] = [];
    for (const expr of declarationExprs(decl)) {
      forEachReference(expr, (name) => own.push(name));
    }
    if (own.includes(decl.name)) continue;

    const site = uses[0];
    const binding = new Map<string, TypeExpr>(
      decl.params.map((param, i): [string, TypeExpr] => [param.name, site.args[i]])
    );
    const inlined = propagateNever(substituteParams(decl.body, binding));
    if (inlined.kind !== 'literal' && inlined.kind !== 'struct') continue;

    return {
      name: decl.name,
      rewrite: (ref) => (ref.name === decl.name ? inlined : ref),
    };
  }

  return undefined;
}

/**
 * Inline forwarding declarations until none remain. The root and
 * declarations carrying hints are never inlined. Declarations are returned
 * in first-discovery order from the root.
 */
export function compressGraph(graph: TypeGraph, root: string): TypeGraph {
  let declarations = new Map(graph.declarations);

  for (let step = findInlining(declarations, root); step; step = findInlining(declarations, root)) {
    const next = new Map<string, Declaration>();
    for (const decl of declarations.values()) {
      if (decl.name === step.name) continue;
      next.set(decl.name, rewriteDeclaration(decl, step.rewrite));
    }
    declarations = next;
  }

  const compressed = assembleGraph(declarations.values());
  return assembleGraph(
    traverseGraph(root, compressed).flatMap((name) => {
      const decl = compressed.declarations.get(name);
      return decl ? [decl] : [];
    })
  );
}
