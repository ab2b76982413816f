/**
 * Recursive-descent parser for the type-declaration dialect.
 *
 * Produces declarations in source order. Any malformed input raises a
 * SchemaSyntaxError; there is no recovery.
 */

import { SchemaSyntaxError } from '../core/errors.js';
import {
  ANY,
  CHOOSE,
  NEVER,
  type Declaration,
  type Field,
  type ParsedSchema,
  type PrimitiveName,
  type TemplateType,
  type TypeExpr,
  type TypeParam,
} from '../core/types.js';
import { tokenize, type Token } from './lexer.js';

const PRIMITIVES: ReadonlySet<string> = new Set<PrimitiveName>(['string', 'number', 'boolean']);

function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVES.has(name);
}

function describe(token: Token): string {
  switch (token.kind) {
    case 'eof':
      return 'end of input';
    case 'string':
      return `string ${JSON.stringify(token.text)}`;
    default:
      return `"${token.text}"`;
  }
}

/**
 * Replace argument-less references to declared parameters with `param` nodes.
 */
function bindParams(expr: TypeExpr, names: ReadonlySet<string>): TypeExpr {
  switch (expr.kind) {
    case 'reference':
      if (expr.args.length === 0 && names.has(expr.name)) {
        return { kind: 'param', name: expr.name };
      }
      return { ...expr, args: expr.args.map((arg) => bindParams(arg, names)) };
    case 'union':
      return { ...expr, members: expr.members.map((member) => bindParams(member, names)) };
    case 'struct':
      return {
        ...expr,
        fields: expr.fields.map((field) => ({ ...field, type: bindParams(field.type, names) })),
      };
    case 'array':
      return { ...expr, element: bindParams(expr.element, names) };
    default:
      return expr;
  }
}

class Parser {
  private readonly tokens: Token[];
  private index = 0;
  private hints: string[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parseSchema(): ParsedSchema {
    const declarations: Declaration[] = [];
    while (this.peek().kind !== 'eof') {
      declarations.push(this.parseDeclaration());
    }
    return { declarations, trailingHints: this.peek().hints };
  }

  private peek(ahead = 0): Token {
    return this.tokens[Math.min(this.index + ahead, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    this.hints.push(...token.hints);
    return token;
  }

  private fail(message: string, token: Token = this.peek()): never {
    throw new SchemaSyntaxError(message, token.position);
  }

  private isPunct(text: string, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.kind === 'punct' && token.text === text;
  }

  private isKeyword(text: string): boolean {
    const token = this.peek();
    return token.kind === 'identifier' && token.text === text;
  }

  private acceptPunct(text: string): boolean {
    if (!this.isPunct(text)) return false;
    this.next();
    return true;
  }

  private expectPunct(text: string): Token {
    if (!this.isPunct(text)) {
      this.fail(`Expected "${text}" but found ${describe(this.peek())}`);
    }
    return this.next();
  }

  private expectIdentifier(what: string): Token {
    const token = this.peek();
    if (token.kind !== 'identifier') {
      this.fail(`Expected ${what} but found ${describe(token)}`);
    }
    return this.next();
  }

  private expectString(what: string): string {
    const token = this.peek();
    if (token.kind !== 'string') {
      this.fail(`Expected ${what} but found ${describe(token)}`);
    }
    return this.next().text;
  }

  private parseDeclaration(): Declaration {
    this.hints = [];
    if (!this.isKeyword('type')) {
      this.fail(`Expected "type" but found ${describe(this.peek())}`);
    }
    this.next();
    const name = this.expectIdentifier('a type name').text;

    const params: TypeParam[] = [];
    const names = new Set<string>();
    if (this.acceptPunct('<')) {
      do {
        if (this.isPunct('>')) break;
        const token = this.expectIdentifier('a type parameter');
        if (names.has(token.text)) {
          this.fail(`Duplicate type parameter "${token.text}"`, token);
        }
        names.add(token.text);
        if (this.isKeyword('extends')) {
          this.next();
          params.push({ name: token.text, constraint: this.parseType() });
        } else {
          params.push({ name: token.text });
        }
      } while (this.acceptPunct(','));
      this.expectPunct('>');
    }

    this.expectPunct('=');
    const body = this.parseType();
    this.acceptPunct(';');

    return {
      name,
      params: params.map((param) =>
        param.constraint ? { ...param, constraint: bindParams(param.constraint, names) } : param
      ),
      body: bindParams(body, names),
      hints: this.hints,
    };
  }

  private parseType(): TypeExpr {
    this.acceptPunct('|');
    const members: TypeExpr[] = [];
    do {
      const member = this.parsePostfix();
      if (member.kind === 'union') {
        members.push(...member.members);
      } else {
        members.push(member);
      }
    } while (this.acceptPunct('|'));
    return members.length === 1 ? members[0] : { kind: 'union', members };
  }

  private parsePostfix(): TypeExpr {
    let expr = this.parsePrimary();
    while (this.isPunct('[') && this.isPunct(']', 1)) {
      this.next();
      this.next();
      expr = { kind: 'array', element: expr };
    }
    return expr;
  }

  private parsePrimary(): TypeExpr {
    const token = this.peek();

    switch (token.kind) {
      case 'string':
        this.next();
        return { kind: 'literal', value: token.text };
      case 'number':
        this.next();
        return { kind: 'literal', value: Number(token.text) };
      case 'punct':
        if (token.text === '(') {
          this.next();
          const inner = this.parseType();
          this.expectPunct(')');
          return inner;
        }
        if (token.text === '{') return this.parseStruct();
        break;
      case 'identifier':
        return this.parseNamed();
      case 'eof':
        break;
    }

    return this.fail(`Unexpected ${describe(token)}`);
  }

  private parseNamed(): TypeExpr {
    const token = this.next();
    const name = token.text;

    if (name === 'any') return ANY;
    if (name === 'never') return NEVER;
    if (name === 'CHOOSE') return CHOOSE;
    if (isPrimitiveName(name)) return { kind: 'primitive', name };
    if (name === 'LITERAL' && this.isPunct('<')) return this.parseTemplate();

    const args: TypeExpr[] = [];
    if (this.acceptPunct('<')) {
      do {
        if (this.isPunct('>')) break;
        args.push(this.parseType());
      } while (this.acceptPunct(','));
      this.expectPunct('>');
      if (args.length === 0) {
        this.fail(`Empty type argument list for "${name}"`, token);
      }
    }
    return { kind: 'reference', name, args };
  }

  private parseTemplate(): TemplateType {
    this.expectPunct('<');
    const label = this.expectString('a LITERAL label');
    this.expectPunct(',');

    const aliases: string[] = [];
    if (this.acceptPunct('[')) {
      do {
        if (this.isPunct(']')) break;
        aliases.push(this.expectString('an alias string'));
      } while (this.acceptPunct(','));
      this.expectPunct(']');
    } else {
      aliases.push(this.expectString('an alias string or list'));
    }
    this.expectPunct(',');

    const flag = this.peek();
    if (flag.kind !== 'identifier' || (flag.text !== 'true' && flag.text !== 'false')) {
      this.fail(`Expected true or false but found ${describe(flag)}`);
    }
    this.next();
    this.expectPunct('>');

    return { kind: 'template', label, aliases, pinned: flag.text === 'true' };
  }

  private parseStruct(): TypeExpr {
    this.expectPunct('{');
    const fields: Field[] = [];
    const seen = new Set<string>();

    while (!this.isPunct('}')) {
      const token = this.peek();
      if (token.kind !== 'identifier' && token.kind !== 'string') {
        this.fail(`Expected a field name but found ${describe(token)}`);
      }
      this.next();
      if (seen.has(token.text)) {
        this.fail(`Duplicate field "${token.text}"`, token);
      }
      seen.add(token.text);

      const optional = this.acceptPunct('?');
      this.expectPunct(':');
      fields.push({ name: token.text, optional, type: this.parseType() });

      if (!this.acceptPunct(',') && !this.acceptPunct(';')) break;
    }

    this.expectPunct('}');
    return { kind: 'struct', fields };
  }
}

/**
 * Parse dialect source text into declarations.
 */
export function parseSchema(text: string): ParsedSchema {
  return new Parser(tokenize(text)).parseSchema();
}
