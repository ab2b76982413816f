/**
 * Query-driven pruning of a type graph.
 *
 * The result accepts a subset of the values the original graph accepts:
 * alternatives are removed, never added. Unchanged subtrees are shared with
 * the source graph, which is never mutated.
 */

import { RootEliminatedError, UnknownRootError } from '../core/errors.js';
import {
  CHOOSE_NAME,
  NEVER,
  isAny,
  isNever,
  type Declaration,
  type ReferenceType,
  type TypeExpr,
  type TypeGraph,
  type TypeParam,
} from '../core/types.js';
import { assembleGraph, forEachReference } from '../graph/build.js';
import { traverseGraph } from '../graph/traverse.js';
import { occurrenceKey, type LiteralIndex } from '../search/indexer.js';
import type { LiveSet } from '../search/query.js';
import { mapReferences, rebuildArray, rebuildStruct, rebuildUnion, sameItems } from './rewrite.js';

/**
 * How a type parameter is bound at an instantiation site.
 */
type ParamState = 'open' | 'never' | 'any';

/**
 * `wildcard` keeps every literal; it applies inside the scope of a parameter
 * bound to `any`.
 */
type Mode = 'filter' | 'wildcard';

interface Scope {
  readonly owner: string;
  readonly mode: Mode;
  readonly params: ReadonlyMap<string, ParamState>;
}

/**
 * A declaration as emitted in one mode.
 */
interface Unit {
  readonly name: string;
  readonly mode: Mode;
  readonly states: readonly ParamState[];
  readonly decl: Declaration;
}

function unitKey(name: string, mode: Mode): string {
  return `${mode}:${name}`;
}

/**
 * `CHOOSE` is always emitted unfiltered.
 */
function modeOf(name: string, mode: Mode): Mode {
  return name === CHOOSE_NAME ? 'wildcard' : mode;
}

/**
 * Expressions of a declaration paired with the mode their references are
 * emitted in: constraints of `any` parameters are wildcard scopes.
 */
function scopedExprs(
  decl: Declaration,
  mode: Mode,
  states: readonly ParamState[]
): [TypeExpr, Mode][] {
  const exprs: [TypeExpr, Mode][] = [];
  decl.params.forEach((param, i) => {
    if (param.constraint) {
      exprs.push([param.constraint, states[i] === 'any' ? 'wildcard' : mode]);
    }
  });
  exprs.push([decl.body, mode]);
  return exprs;
}

function unitTargets(unit: Unit, graph: TypeGraph): { name: string; mode: Mode }[] {
  const targets: { name: string; mode: Mode }[] = [];
  for (const [expr, mode] of scopedExprs(unit.decl, unit.mode, unit.states)) {
    forEachReference(expr, (name) => {
      if (graph.declarations.has(name)) targets.push({ name, mode: modeOf(name, mode) });
    });
  }
  return targets;
}

/**
 * Units whose body is empty once references to other empty units are
 * removed.
 */
function findEliminated(units: readonly Unit[]): Set<string> {
  const eliminated = new Set<string>();
  let changed = true;
  while (changed) {
    changed = false;
    for (const unit of units) {
      const key = unitKey(unit.name, unit.mode);
      if (eliminated.has(key)) continue;
      const body = mapReferences(unit.decl.body, (ref) =>
        eliminated.has(unitKey(ref.name, modeOf(ref.name, unit.mode))) ? NEVER : ref
      );
      if (isNever(body)) {
        eliminated.add(key);
        changed = true;
      }
    }
  }
  return eliminated;
}

/**
 * Names reached in both modes whose wildcard emission differs from the
 * filtered one, mapped to a fresh name for the unfiltered copy.
 */
function copyNames(units: readonly Unit[], graph: TypeGraph): Map<string, string> {
  const filtered = new Map<string, Unit>();
  for (const unit of units) {
    if (unit.mode === 'filter') filtered.set(unit.name, unit);
  }
  const twins = units.filter((unit) => unit.mode === 'wildcard' && filtered.has(unit.name));

  const distinct = new Set<string>();
  let changed = true;
  while (changed) {
    changed = false;
    for (const unit of twins) {
      if (distinct.has(unit.name)) continue;
      const differs =
        filtered.get(unit.name)?.decl !== unit.decl ||
        unitTargets(unit, graph).some(
          (target) => target.mode === 'wildcard' && distinct.has(target.name)
        );
      if (differs) {
        distinct.add(unit.name);
        changed = true;
      }
    }
  }

  const taken = new Set(graph.declarations.keys());
  const copies = new Map<string, string>();
  for (const name of distinct) {
    let copy = `${name}All`;
    for (let n = 2; taken.has(copy); n++) copy = `${name}All${n}`;
    taken.add(copy);
    copies.set(name, copy);
  }
  return copies;
}

/**
 * Prune `graph` to the declarations reachable from `root` that survive the
 * live set.
 *
 * A declaration used both in filtered scopes and in the scope of a
 * parameter bound to `any` is emitted twice: filtered under its own name,
 * and unfiltered under a fresh `<Name>All` name for the wildcard uses.
 *
 * Throws UnknownRootError if `root` is not declared and RootEliminatedError
 * if nothing of the root survives.
 */
export function pruneGraph(
  graph: TypeGraph,
  index: LiteralIndex,
  root: string,
  live: LiveSet
): TypeGraph {
  if (!graph.declarations.has(root)) {
    throw new UnknownRootError(root);
  }
  const rootKey = unitKey(root, modeOf(root, 'filter'));

  // Units found empty in one pass are forced to never in the next, so that
  // instantiations depending on them are evaluated again.
  const forced = new Set<string>();
  while (true) {
    const units = emitUnits(graph, index, root, live, forced);
    const eliminated = findEliminated(units);
    if (eliminated.has(rootKey)) {
      throw new RootEliminatedError(root);
    }
    if (eliminated.size === 0) {
      return assemble(graph, root, units);
    }
    for (const key of eliminated) forced.add(key);
  }
}

/**
 * One pruning pass: emit every unit reachable from the root.
 */
function emitUnits(
  graph: TypeGraph,
  index: LiteralIndex,
  root: string,
  live: LiveSet,
  forced: ReadonlySet<string>
): Unit[] {
  const memo = new Map<string, TypeExpr>();
  const active = new Set<string>();
  const anyParams = new Map<string, Set<string>>();

  function markAny(decl: Declaration, position: number) {
    let names = anyParams.get(decl.name);
    if (!names) {
      names = new Set();
      anyParams.set(decl.name, names);
    }
    names.add(decl.params[position].name);
  }

  function paramState(arg: TypeExpr, scope: Scope): ParamState {
    if (isNever(arg)) return 'never';
    if (isAny(arg)) return 'any';
    if (arg.kind === 'param' && scope.params.get(arg.name) === 'any') return 'any';
    return 'open';
  }

  function scopeFor(decl: Declaration, states: readonly ParamState[], mode: Mode): Scope {
    return {
      owner: decl.name,
      mode,
      params: new Map(
        decl.params.map((param, i): [string, ParamState] => [param.name, states[i]])
      ),
    };
  }

  /**
   * Filtered body of a declaration under a binding. Returns undefined when the
   * same key is already being evaluated further up the stack.
   */
  function evaluate(
    decl: Declaration,
    states: readonly ParamState[],
    mode: Mode
  ): TypeExpr | undefined {
    const key = `${decl.name}<${states.join(',')}>${mode === 'wildcard' ? '*' : ''}`;
    const cached = memo.get(key);
    if (cached) return cached;
    if (active.has(key)) return undefined;

    active.add(key);
    const body = filterExpr(decl.body, scopeFor(decl, states, mode));
    active.delete(key);
    memo.set(key, body);
    return body;
  }

  function filterReference(expr: ReferenceType, scope: Scope): TypeExpr {
    const decl = graph.declarations.get(expr.name);
    if (!decl) return expr;
    if (forced.has(unitKey(decl.name, modeOf(decl.name, scope.mode)))) return NEVER;

    const args = expr.args.map((arg) => filterExpr(arg, scope));
    const states = args.map((arg) => paramState(arg, scope));
    states.forEach((state, i) => {
      if (state === 'any') markAny(decl, i);
    });

    const body = evaluate(decl, states, scope.mode);
    // A cycle back into an active evaluation is kept; later passes settle it
    if (body !== undefined && isNever(body)) return NEVER;

    return sameItems(args, expr.args) ? expr : { ...expr, args };
  }

  function filterExpr(expr: TypeExpr, scope: Scope): TypeExpr {
    switch (expr.kind) {
      case 'literal':
        if (typeof expr.value !== 'string' || scope.mode === 'wildcard') return expr;
        return live.has(occurrenceKey(scope.owner, expr.value)) ? expr : NEVER;
      case 'template': {
        if (expr.pinned || scope.mode === 'wildcard') return expr;
        const key = occurrenceKey(scope.owner, expr.label);
        return index.pinned.has(key) || live.has(key) ? expr : NEVER;
      }
      case 'primitive':
        return expr;
      case 'special':
        if (expr.special === 'choose' && forced.has(unitKey(CHOOSE_NAME, 'wildcard'))) {
          return NEVER;
        }
        return expr;
      case 'param':
        return scope.params.get(expr.name) === 'never' ? NEVER : expr;
      case 'union':
        return rebuildUnion(
          expr,
          expr.members.map((member) => filterExpr(member, scope))
        );
      case 'struct':
        return rebuildStruct(
          expr,
          expr.fields.map((field) => filterExpr(field.type, scope))
        );
      case 'array':
        return rebuildArray(expr, filterExpr(expr.element, scope));
      case 'reference':
        return filterReference(expr, scope);
    }
  }

  function statesOf(decl: Declaration): ParamState[] {
    const wild = anyParams.get(decl.name);
    return decl.params.map((param): ParamState => (wild?.has(param.name) ? 'any' : 'open'));
  }

  function emit(decl: Declaration, mode: Mode, states: readonly ParamState[]): Declaration {
    const scope = scopeFor(decl, states, mode);
    const body = evaluate(decl, states, mode) ?? decl.body;

    const params: TypeParam[] = decl.params.map((param, i) => {
      if (!param.constraint) return param;
      const constraintScope: Scope =
        states[i] === 'any' ? { ...scope, mode: 'wildcard' } : scope;
      const constraint = filterExpr(param.constraint, constraintScope);
      if (isNever(constraint)) return { name: param.name };
      return constraint === param.constraint ? param : { name: param.name, constraint };
    });

    if (body === decl.body && sameItems(params, decl.params)) return decl;
    return { ...decl, params, body };
  }

  // Emit reachable units until the `any` bindings settle
  const emitted = new Map<string, Unit>();
  let reached: { name: string; mode: Mode }[] = [];
  let dirty = true;
  while (dirty) {
    dirty = false;
    reached = [{ name: root, mode: modeOf(root, 'filter') }];
    const seen = new Set(reached.map((target) => unitKey(target.name, target.mode)));

    for (let i = 0; i < reached.length; i++) {
      const { name, mode } = reached[i];
      const decl = graph.declarations.get(name);
      if (!decl) continue;

      const key = unitKey(name, mode);
      const states = statesOf(decl);
      let unit = emitted.get(key);
      if (!unit || !sameItems(unit.states, states)) {
        unit = { name, mode, states, decl: emit(decl, mode, states) };
        emitted.set(key, unit);
        dirty = true;
      }

      for (const target of unitTargets(unit, graph)) {
        const targetKey = unitKey(target.name, target.mode);
        if (!seen.has(targetKey)) {
          seen.add(targetKey);
          reached.push(target);
        }
      }
    }
  }

  return reached.flatMap((target) => {
    const unit = emitted.get(unitKey(target.name, target.mode));
    return unit ? [unit] : [];
  });
}

/**
 * Build the output graph from the units of the final pass.
 */
function assemble(graph: TypeGraph, root: string, units: readonly Unit[]): TypeGraph {
  const copies = copyNames(units, graph);
  const rename = (expr: TypeExpr, mode: Mode): TypeExpr =>
    mode === 'wildcard' && copies.size > 0
      ? mapReferences(expr, (ref) => {
          const copy = copies.get(ref.name);
          return copy ? { ...ref, name: copy } : ref;
        })
      : expr;

  const survivors = units.map((unit) => {
    const decl = unit.decl;
    const params = decl.params.map((param, i) => {
      if (!param.constraint) return param;
      const constraint = rename(param.constraint, unit.states[i] === 'any' ? 'wildcard' : unit.mode);
      return constraint === param.constraint ? param : { ...param, constraint };
    });
    const body = rename(decl.body, unit.mode);
    const name = unit.mode === 'wildcard' ? copies.get(unit.name) ?? unit.name : unit.name;

    if (name === decl.name && body === decl.body && sameItems(params, decl.params)) return decl;
    return { ...decl, name, params, body };
  });

  const pruned = assembleGraph(survivors);
  return assembleGraph(
    traverseGraph(root, pruned).flatMap((name) => {
      const decl = pruned.declarations.get(name);
      return decl ? [decl] : [];
    })
  );
}
