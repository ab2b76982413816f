/**
 * Type graph construction: symbol table, reference resolution and arity checks.
 */

import {
  ArityMismatchError,
  DanglingReferenceError,
  DuplicateDeclarationError,
} from '../core/errors.js';
import {
  CHOOSE_NAME,
  type Declaration,
  type ParsedSchema,
  type SymbolEntry,
  type TypeExpr,
  type TypeGraph,
} from '../core/types.js';

/**
 * Visit every reference in an expression, in source order.
 * `CHOOSE` is reported as a reference to the `CHOOSE` declaration.
 */
export function forEachReference(
  expr: TypeExpr,
  visit: (name: string, args: readonly TypeExpr[]) => void
): void {
  switch (expr.kind) {
    case 'reference':
      visit(expr.name, expr.args);
      for (const arg of expr.args) forEachReference(arg, visit);
      return;
    case 'union':
      for (const member of expr.members) forEachReference(member, visit);
      return;
    case 'struct':
      for (const field of expr.fields) forEachReference(field.type, visit);
      return;
    case 'array':
      forEachReference(expr.element, visit);
      return;
    case 'special':
      if (expr.special === 'choose') visit(CHOOSE_NAME, []);
      return;
    default:
      return;
  }
}

/**
 * Expressions owned by a declaration: parameter constraints, then the body.
 */
export function declarationExprs(decl: Declaration): TypeExpr[] {
  const exprs: TypeExpr[] = [];
  for (const param of decl.params) {
    if (param.constraint) exprs.push(param.constraint);
  }
  exprs.push(decl.body);
  return exprs;
}

/**
 * Distinct declaration names referenced by a declaration, in first-appearance
 * order. `CHOOSE` is only listed when `known` declares it.
 */
export function referencedNames(
  decl: Declaration,
  known: ReadonlyMap<string, Declaration>
): string[] {
  const names: string[] = [];
  for (const expr of declarationExprs(decl)) {
    forEachReference(expr, (name) => {
      if (!names.includes(name) && known.has(name)) names.push(name);
    });
  }
  return names;
}

/**
 * Index declarations without validating references. Used for graphs that are
 * derived from an already validated graph.
 */
export function assembleGraph(
  declarations: Iterable<Declaration>,
  trailingHints: readonly string[] = []
): TypeGraph {
  const byName = new Map<string, Declaration>();
  const symbols = new Map<string, SymbolEntry>();
  const order: string[] = [];

  for (const decl of declarations) {
    if (byName.has(decl.name)) {
      throw new DuplicateDeclarationError(decl.name);
    }
    byName.set(decl.name, decl);
    symbols.set(decl.name, { name: decl.name, arity: decl.params.length, position: order.length });
    order.push(decl.name);
  }

  const edges = new Map<string, readonly string[]>();
  for (const decl of byName.values()) {
    edges.set(decl.name, referencedNames(decl, byName));
  }

  return { declarations: byName, symbols, edges, order, trailingHints };
}

/**
 * Build the type graph for a parsed schema.
 *
 * Cycles are legal. Throws on duplicate names, unknown references and
 * argument count mismatches.
 */
export function buildGraph(parsed: ParsedSchema): TypeGraph {
  const graph = assembleGraph(parsed.declarations, parsed.trailingHints);

  for (const decl of graph.declarations.values()) {
    for (const expr of declarationExprs(decl)) {
      forEachReference(expr, (name, args) => {
        if (name === CHOOSE_NAME && args.length === 0 && !graph.symbols.has(name)) return;
        const symbol = graph.symbols.get(name);
        if (!symbol) {
          throw new DanglingReferenceError(name, decl.name);
        }
        if (symbol.arity !== args.length) {
          throw new ArityMismatchError(name, decl.name, symbol.arity, args.length);
        }
      });
    }
  }

  return graph;
}
