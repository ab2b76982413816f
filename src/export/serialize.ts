/**
 * Compact serialization of type graphs back to dialect text.
 *
 * Output is deterministic: one declaration per line, no optional whitespace,
 * hints as comment lines above their declaration.
 */

import type { Declaration, Field, TypeExpr, TypeGraph } from '../core/types.js';
import { traverseGraph } from '../graph/traverse.js';

export interface SerializeOptions {
  /**
   * Emit templates as `LITERAL<...>` instead of their label and hints as
   * `// Hint: text` instead of `// text`, so that the output re-parses to the
   * same graph.
   */
  preserveTemplates?: boolean;
}

export interface SerializeGraphOptions extends SerializeOptions {
  /** Emit only declarations reachable from this one, in discovery order. */
  root?: string;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function formatString(value: string): string {
  return JSON.stringify(value);
}

function formatHint(hint: string, options: SerializeOptions): string {
  return options.preserveTemplates ? `// Hint: ${hint}` : `// ${hint}`;
}

function formatField(field: Field, options: SerializeOptions): string {
  const name = IDENTIFIER.test(field.name) ? field.name : formatString(field.name);
  return `${name}${field.optional ? '?' : ''}:${formatExpr(field.type, options)}`;
}

/**
 * Format a single type expression.
 */
export function formatExpr(expr: TypeExpr, options: SerializeOptions = {}): string {
  switch (expr.kind) {
    case 'reference':
      if (expr.args.length === 0) return expr.name;
      return `${expr.name}<${expr.args.map((arg) => formatExpr(arg, options)).join(',')}>`;
    case 'param':
      return expr.name;
    case 'union':
      return expr.members.map((member) => formatExpr(member, options)).join('|');
    case 'struct':
      return `{${expr.fields.map((field) => formatField(field, options)).join(',')}}`;
    case 'array': {
      const element = formatExpr(expr.element, options);
      return expr.element.kind === 'union' ? `(${element})[]` : `${element}[]`;
    }
    case 'literal':
      return typeof expr.value === 'string' ? formatString(expr.value) : String(expr.value);
    case 'primitive':
      return expr.name;
    case 'special':
      return expr.special === 'choose' ? 'CHOOSE' : expr.special;
    case 'template':
      if (!options.preserveTemplates) return formatString(expr.label);
      return `LITERAL<${formatString(expr.label)},[${expr.aliases.map(formatString).join(',')}],${expr.pinned}>`;
  }
}

/**
 * Format a declaration with its hint lines.
 */
export function formatDeclaration(decl: Declaration, options: SerializeOptions = {}): string {
  const params =
    decl.params.length === 0
      ? ''
      : `<${decl.params
          .map((param) =>
            param.constraint
              ? `${param.name} extends ${formatExpr(param.constraint, options)}`
              : param.name
          )
          .join(',')}>`;
  const lines = decl.hints.map((hint) => formatHint(hint, options));
  lines.push(`type ${decl.name}${params}=${formatExpr(decl.body, options)};`);
  return lines.join('\n');
}

/**
 * Serialize a graph. With a root, only declarations reachable from it are
 * written, in first-discovery order; otherwise all of them in source order,
 * followed by trailing hints.
 */
export function serializeGraph(graph: TypeGraph, options: SerializeGraphOptions = {}): string {
  const names = options.root ? traverseGraph(options.root, graph) : graph.order;
  const lines: string[] = [];
  for (const name of names) {
    const decl = graph.declarations.get(name);
    if (decl) lines.push(formatDeclaration(decl, options));
  }
  if (!options.root) {
    lines.push(...graph.trailingHints.map((hint) => formatHint(hint, options)));
  }
  return lines.join('\n');
}
