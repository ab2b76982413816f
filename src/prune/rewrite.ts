/**
 * Structural rewriting shared by pruning and compression.
 *
 * `never` propagates the same way everywhere: a union drops `never` members
 * (and becomes `never` when none are left), a struct drops optional `never`
 * fields and becomes `never` on a required one, an array of `never` is
 * `never`.
 */

import {
  NEVER,
  isNever,
  type ArrayType,
  type Field,
  type ReferenceType,
  type StructType,
  type TypeExpr,
  type UnionType,
} from '../core/types.js';

export function sameItems<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

export function makeUnion(members: TypeExpr[]): TypeExpr {
  if (members.length === 0) return NEVER;
  if (members.length === 1) return members[0];
  return { kind: 'union', members };
}

/**
 * Rebuild a union from rewritten members. Nested unions are flattened.
 */
export function rebuildUnion(expr: UnionType, members: readonly TypeExpr[]): TypeExpr {
  const kept = members
    .flatMap((member) => (member.kind === 'union' ? member.members : [member]))
    .filter((member) => !isNever(member));
  if (sameItems(kept, expr.members)) return expr;
  return makeUnion(kept);
}

/**
 * Rebuild a struct from rewritten field types, given in field order.
 */
export function rebuildStruct(expr: StructType, types: readonly TypeExpr[]): TypeExpr {
  const fields: Field[] = [];
  for (let i = 0; i < expr.fields.length; i++) {
    const field = expr.fields[i];
    const type = types[i];
    if (isNever(type)) {
      if (field.optional) continue;
      return NEVER;
    }
    fields.push(type === field.type ? field : { ...field, type });
  }
  if (sameItems(fields, expr.fields)) return expr;
  return { kind: 'struct', fields };
}

export function rebuildArray(expr: ArrayType, element: TypeExpr): TypeExpr {
  if (isNever(element)) return NEVER;
  return element === expr.element ? expr : { kind: 'array', element };
}

/**
 * Rewrite every reference in an expression, innermost first, and propagate
 * any `never` the rewrite introduces. Subtrees without a rewrite are
 * returned as-is.
 */
export function mapReferences(
  expr: TypeExpr,
  rewrite: (ref: ReferenceType) => TypeExpr
): TypeExpr {
  switch (expr.kind) {
    case 'reference': {
      const args = expr.args.map((arg) => mapReferences(arg, rewrite));
      return rewrite(sameItems(args, expr.args) ? expr : { ...expr, args });
    }
    case 'union':
      return rebuildUnion(
        expr,
        expr.members.map((member) => mapReferences(member, rewrite))
      );
    case 'struct':
      return rebuildStruct(
        expr,
        expr.fields.map((field) => mapReferences(field.type, rewrite))
      );
    case 'array':
      return rebuildArray(expr, mapReferences(expr.element, rewrite));
    default:
      return expr;
  }
}

/**
 * Propagate `never` through an expression without rewriting references.
 * A `never` type argument stays in place.
 */
export function propagateNever(expr: TypeExpr): TypeExpr {
  return mapReferences(expr, (ref) => ref);
}
