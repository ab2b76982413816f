/**
 * Tests for type graph construction and validation.
 */

import { describe, it, expect } from 'vitest';
import { buildGraph } from '../../src/graph/build.js';
import { parseSchema } from '../../src/parser/parser.js';
import {
  ArityMismatchError,
  DanglingReferenceError,
  DuplicateDeclarationError,
} from '../../src/core/errors.js';

function graphOf(source: string) {
  return buildGraph(parseSchema(source));
}

describe('buildGraph', () => {
  it('should index declarations and their references', () => {
    const graph = graphOf(
      'type Cart={items:Item[]}; type Item=A|B; type A={name:"X"}; type B={name:"Y"};'
    );

    expect(graph.order).toEqual(['Cart', 'Item', 'A', 'B']);
    expect(graph.edges.get('Cart')).toEqual(['Item']);
    expect(graph.edges.get('Item')).toEqual(['A', 'B']);
    expect(graph.edges.get('A')).toEqual([]);
    expect(graph.symbols.get('Item')).toEqual({ name: 'Item', arity: 0, position: 1 });
  });

  it('should record arity of generic declarations', () => {
    const graph = graphOf('type Box<T, U> = {t: T, u: U}; type Use = Box<"a", "b">;');

    expect(graph.symbols.get('Box')?.arity).toBe(2);
    expect(graph.edges.get('Use')).toEqual(['Box']);
  });

  it('should allow recursive and mutually recursive types', () => {
    const graph = graphOf('type Tree={children:Tree[]}; type A={b?:B}; type B={a?:A};');

    expect(graph.edges.get('Tree')).toEqual(['Tree']);
    expect(graph.edges.get('A')).toEqual(['B']);
    expect(graph.edges.get('B')).toEqual(['A']);
  });

  it('should reject duplicate declarations', () => {
    expect(() => graphOf('type A="x"; type A="y";')).toThrow(DuplicateDeclarationError);
  });

  it('should reject references to undeclared types', () => {
    try {
      graphOf('type A = B;');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DanglingReferenceError);
      if (error instanceof DanglingReferenceError) {
        expect(error.reference).toBe('B');
        expect(error.declaration).toBe('A');
      }
    }
  });

  it('should check references inside constraints', () => {
    expect(() => graphOf('type A<T extends Missing> = {v: T};')).toThrow(
      'Unknown type "Missing" referenced from "A"'
    );
  });

  it('should reject too few type arguments', () => {
    try {
      graphOf('type Foo<A, B> = {a: A, b: B}; type X = Foo<"a">;');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ArityMismatchError);
      if (error instanceof ArityMismatchError) {
        expect(error.reference).toBe('Foo');
        expect(error.declaration).toBe('X');
        expect(error.expected).toBe(2);
        expect(error.actual).toBe(1);
      }
    }
  });

  it('should reject a generic used without arguments', () => {
    expect(() => graphOf('type Foo<T> = {v: T}; type X = Foo;')).toThrow(ArityMismatchError);
  });

  it('should treat CHOOSE as built in unless declared', () => {
    expect(graphOf('type S = "a" | CHOOSE;').edges.get('S')).toEqual([]);

    const declared = graphOf('type S = "a" | CHOOSE; type CHOOSE = "CHOOSE";');
    expect(declared.edges.get('S')).toEqual(['CHOOSE']);
  });

  it('should keep trailing hints', () => {
    const graph = graphOf('type A = "x"; // Hint: pick one');
    expect(graph.trailingHints).toEqual(['pick one']);
  });
});
