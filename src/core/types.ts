/**
 * Core type definitions for declarations and type expressions.
 */

/**
 * Sentinel types.
 */
export type SpecialKind = 'any' | 'never' | 'choose';

/**
 * Primitive keywords accepted by the dialect.
 */
export type PrimitiveName = 'string' | 'number' | 'boolean';

/**
 * Use of a declared name, possibly instantiated with type arguments.
 */
export interface ReferenceType {
  readonly kind: 'reference';
  readonly name: string;
  readonly args: readonly TypeExpr[];
}

/**
 * Use of a type parameter of the enclosing declaration.
 */
export interface ParamType {
  readonly kind: 'param';
  readonly name: string;
}

export interface UnionType {
  readonly kind: 'union';
  readonly members: readonly TypeExpr[];
}

export interface Field {
  readonly name: string;
  readonly optional: boolean;
  readonly type: TypeExpr;
}

export interface StructType {
  readonly kind: 'struct';
  readonly fields: readonly Field[];
}

export interface ArrayType {
  readonly kind: 'array';
  readonly element: TypeExpr;
}

export interface LiteralType {
  readonly kind: 'literal';
  readonly value: string | number;
}

export interface PrimitiveType {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
}

export interface SpecialType {
  readonly kind: 'special';
  readonly special: SpecialKind;
}

/**
 * A named literal with search aliases, written `LITERAL<"label", ["alias"], pinned>`.
 * A pinned template survives pruning regardless of the query.
 */
export interface TemplateType {
  readonly kind: 'template';
  readonly label: string;
  readonly aliases: readonly string[];
  readonly pinned: boolean;
}

export type TypeExpr =
  | ReferenceType
  | ParamType
  | UnionType
  | StructType
  | ArrayType
  | LiteralType
  | PrimitiveType
  | SpecialType
  | TemplateType;

export interface TypeParam {
  readonly name: string;
  readonly constraint?: TypeExpr;
}

/**
 * One named type definition.
 */
export interface Declaration {
  readonly name: string;
  readonly params: readonly TypeParam[];
  readonly body: TypeExpr;
  /** Text of `Hint:` comments, re-emitted above the declaration. */
  readonly hints: readonly string[];
}

/**
 * Parser output.
 */
export interface ParsedSchema {
  readonly declarations: readonly Declaration[];
  /** Hints that follow the last declaration. */
  readonly trailingHints: readonly string[];
}

export interface SymbolEntry {
  readonly name: string;
  readonly arity: number;
  /** Index of the declaration in source order. */
  readonly position: number;
}

/**
 * Name-indexed declaration arena. All cross references are by name, so
 * cycles need no special representation.
 */
export interface TypeGraph {
  readonly declarations: ReadonlyMap<string, Declaration>;
  readonly symbols: ReadonlyMap<string, SymbolEntry>;
  /** Distinct names referenced by each declaration, in first-appearance order. */
  readonly edges: ReadonlyMap<string, readonly string[]>;
  readonly order: readonly string[];
  readonly trailingHints: readonly string[];
}

/**
 * Name of the declaration that backs the built-in `CHOOSE` form, when a schema
 * declares one.
 */
export const CHOOSE_NAME = 'CHOOSE';

export const ANY: SpecialType = { kind: 'special', special: 'any' };
export const NEVER: SpecialType = { kind: 'special', special: 'never' };
export const CHOOSE: SpecialType = { kind: 'special', special: 'choose' };

export function isNever(expr: TypeExpr): boolean {
  return expr.kind === 'special' && expr.special === 'never';
}

export function isAny(expr: TypeExpr): boolean {
  return expr.kind === 'special' && expr.special === 'any';
}
