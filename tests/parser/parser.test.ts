/**
 * Tests for the declaration parser, checked through the compact formatter.
 */

import { describe, it, expect } from 'vitest';
import { parseSchema } from '../../src/parser/parser.js';
import { formatDeclaration } from '../../src/export/serialize.js';
import { SchemaSyntaxError } from '../../src/core/errors.js';

function format(source: string, preserveTemplates = false): string {
  const parsed = parseSchema(source);
  return [
    ...parsed.declarations.map((decl) => formatDeclaration(decl, { preserveTemplates })),
    ...parsed.trailingHints.map((hint) => `// ${hint}`),
  ].join('\n');
}

describe('parseSchema', () => {
  it.each([
    ["type a='Jalapeños';", 'type a="Jalapeños";'],
    ['type a=never;', 'type a=never;'],
    ['type a<A,B,C>=never;', 'type a<A,B,C>=never;'],
    ['type a<A,B,C>={a:A, b:B, c:C};', 'type a<A,B,C>={a:A,b:B,c:C};'],
    ['type a=123;', 'type a=123;'],
    ["type D={a:1,b:'text'};", 'type D={a:1,b:"text"};'],
    ['type A=B[];', 'type A=B[];'],
    ['type A=B|C;', 'type A=B|C;'],
    ['type A = (B | C)[];', 'type A=(B|C)[];'],
    ['type ArrayType = \n  string[]; // array of strings', 'type ArrayType=string[];'],
  ])('should format %j compactly', (source, expected) => {
    expect(format(source)).toBe(expected);
  });

  it('should drop ordinary comments', () => {
    expect(format('type A = /* simple block */ B;')).toBe('type A=B;');
    expect(format('type A = B; // trailing comment')).toBe('type A=B;');
    expect(format('type Complex = {\n  // the name\n  name: string\n};')).toBe(
      'type Complex={name:string};'
    );
  });

  it('should attach a hint inside a declaration to it', () => {
    expect(format('type A = /* Hint: block hint */ B;')).toBe('// block hint\ntype A=B;');
  });

  it('should attach a hint before a declaration to it', () => {
    const source = [
      '// Hint: This type represents options',
      'type Options = {',
      '  // This field is required',
      '  required: string',
      '};',
    ].join('\n');

    expect(format(source)).toBe('// This type represents options\ntype Options={required:string};');
  });

  it('should keep hints after the last declaration as trailing hints', () => {
    const parsed = parseSchema('type A = B; // Hint: trailing hint');

    expect(parsed.declarations[0].hints).toEqual([]);
    expect(parsed.trailingHints).toEqual(['trailing hint']);
    expect(format('type A = B; // Hint: trailing hint')).toBe('type A=B;\n// trailing hint');
  });

  it('should collect several hints in order', () => {
    const source = '// Hint: First hint\n// Regular comment\n// Hint: Second hint\ntype TestType = string;';
    const parsed = parseSchema(source);

    expect(parsed.declarations[0].hints).toEqual(['First hint', 'Second hint']);
  });

  it('should read LITERAL templates', () => {
    const parsed = parseSchema('type Drink = LITERAL<"Latte", ["caffe latte", "latte"], false>;');

    expect(parsed.declarations[0].body).toEqual({
      kind: 'template',
      label: 'Latte',
      aliases: ['caffe latte', 'latte'],
      pinned: false,
    });
  });

  it('should accept a single alias string', () => {
    const parsed = parseSchema("type Size = LITERAL<'regular', 'normal', true>;");

    expect(parsed.declarations[0].body).toEqual({
      kind: 'template',
      label: 'regular',
      aliases: ['normal'],
      pinned: true,
    });
  });

  it('should format templates as their label unless preserved', () => {
    const source = "type LiteralWithComment = \n  /* comment before */ \n  LITERAL<'value', ['alias'], true>;";

    expect(format(source)).toBe('type LiteralWithComment="value";');
    expect(format(source, true)).toBe('type LiteralWithComment=LITERAL<"value",["alias"],true>;');
  });

  it('should bind declared parameters', () => {
    const parsed = parseSchema('type Box<T extends "a"|"b"> = {value: T, items?: T[], other: U};');
    const body = parsed.declarations[0].body;

    expect(body.kind).toBe('struct');
    if (body.kind !== 'struct') return;
    expect(body.fields[0].type).toEqual({ kind: 'param', name: 'T' });
    expect(body.fields[1]).toEqual({
      name: 'items',
      optional: true,
      type: { kind: 'array', element: { kind: 'param', name: 'T' } },
    });
    expect(body.fields[2].type).toEqual({ kind: 'reference', name: 'U', args: [] });
    expect(format('type Box<T extends "a"|"b"> = {value: T};')).toBe(
      'type Box<T extends "a"|"b">={value:T};'
    );
  });

  it('should flatten nested unions and accept a leading bar', () => {
    const parsed = parseSchema('type A =\n  | "x"\n  | ("y" | "z");');
    const body = parsed.declarations[0].body;

    expect(body.kind === 'union' && body.members.length).toBe(3);
    expect(format('type A =\n  | "x"\n  | ("y" | "z");')).toBe('type A="x"|"y"|"z";');
  });

  it('should read CHOOSE, any and primitives as built-ins', () => {
    const parsed = parseSchema('type Size = "small" | CHOOSE | any | number;');
    const body = parsed.declarations[0].body;

    expect(body).toEqual({
      kind: 'union',
      members: [
        { kind: 'literal', value: 'small' },
        { kind: 'special', special: 'choose' },
        { kind: 'special', special: 'any' },
        { kind: 'primitive', name: 'number' },
      ],
    });
  });

  it('should accept quoted field names and semicolon separators', () => {
    expect(format('type A = {"first name": string; age?: number;};')).toBe(
      'type A={"first name":string,age?:number};'
    );
  });

  describe('errors', () => {
    it('should reject a missing type expression', () => {
      expect(() => parseSchema('type A = ;')).toThrow('Unexpected ";" at line 1, column 10');
    });

    it('should reject a missing equals sign', () => {
      expect(() => parseSchema('type A "x";')).toThrow(
        'Expected "=" but found string "x" at line 1, column 8'
      );
    });

    it('should reject duplicate fields', () => {
      expect(() => parseSchema('type A = {a: "x", a: "y"};')).toThrow(
        'Duplicate field "a" at line 1, column 19'
      );
    });

    it('should reject duplicate type parameters', () => {
      expect(() => parseSchema('type A<T, T> = T;')).toThrow('Duplicate type parameter "T"');
    });

    it('should reject empty argument lists', () => {
      expect(() => parseSchema('type A = B<>;')).toThrow('Empty type argument list for "B"');
    });

    it('should fail on truncated input rather than return a partial result', () => {
      expect(() => parseSchema('type A = "x"; type B = ')).toThrow(
        'Unexpected end of input at line 1, column 24'
      );
    });

    it('should raise SchemaSyntaxError with a position', () => {
      try {
        parseSchema('type A = {\n  a: ]\n};');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(SchemaSyntaxError);
        if (error instanceof SchemaSyntaxError) {
          expect(error.position).toEqual({ offset: 16, line: 2, column: 6 });
        }
      }
    });
  });
});
