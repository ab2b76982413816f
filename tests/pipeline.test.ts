/**
 * Tests for the load-once, prune-per-request pipeline.
 */

import { describe, it, expect } from 'vitest';
import { RootEliminatedError } from '../src/core/errors.js';
import { serializeGraph } from '../src/export/serialize.js';
import { loadSchema, shrinkSchema } from '../src/pipeline.js';

const CART = 'type Cart={items:Item[]}; type Item=A|B; type A={name:"X"}; type B={name:"Y"};';

const ORDER = `
// Hint: one entry per drink
type Order = {items: Line[]};
type Line = Drink | Food;
type Drink = {name: LITERAL<"Latte", ["caffe latte"], false> | "Mocha", milk?: Milk};
type Milk = "oat" | "whole";
type Food = {name: "bagel" | "muffin"};
`;

describe('shrinkSchema', () => {
  it('should prune and compress by default', () => {
    const result = shrinkSchema(loadSchema(CART), { root: 'Cart', phrase: 'x' });

    expect(result.text).toBe('type Cart={items:A[]};\ntype A={name:"X"};');
    expect(result.live).toEqual(new Set(['A:"X"']));
  });

  it('should skip compression when asked', () => {
    const result = shrinkSchema(loadSchema(CART), { root: 'Cart', phrase: 'x', compress: false });

    expect(result.text).toBe('type Cart={items:Item[]};\ntype Item=A;\ntype A={name:"X"};');
  });

  it('should combine the phrase with cart contents', () => {
    const schema = loadSchema(ORDER);
    const result = shrinkSchema(schema, {
      root: 'Order',
      phrase: 'add a caffe latte',
      cart: { items: [{ name: 'bagel' }], note: 'oat milk' },
    });

    expect(result.text).toBe(
      [
        '// one entry per drink',
        'type Order={items:Line[]};',
        'type Line=Drink|Food;',
        'type Drink={name:"Latte",milk?:Milk};',
        'type Milk="oat";',
        'type Food={name:"bagel"};',
      ].join('\n')
    );
  });

  it('should keep templates when asked', () => {
    const result = shrinkSchema(loadSchema(ORDER), {
      root: 'Order',
      phrase: 'latte',
      preserveTemplates: true,
    });

    expect(result.text).toBe(
      [
        '// Hint: one entry per drink',
        'type Order={items:Drink[]};',
        'type Drink={name:LITERAL<"Latte",["caffe latte"],false>};',
      ].join('\n')
    );
  });

  it('should reuse one loaded schema across requests', () => {
    const schema = loadSchema(ORDER);
    const before = serializeGraph(schema.graph);

    shrinkSchema(schema, { root: 'Order', phrase: 'bagel' });
    shrinkSchema(schema, { root: 'Order', phrase: 'mocha whole' });

    expect(serializeGraph(schema.graph)).toBe(before);
    expect(shrinkSchema(schema, { root: 'Order', phrase: 'muffin' }).text).toBe(
      '// one entry per drink\ntype Order={items:Food[]};\ntype Food={name:"muffin"};'
    );
  });

  it('should raise when the query eliminates the root', () => {
    expect(() => shrinkSchema(loadSchema(CART), { root: 'Cart', phrase: 'nothing' })).toThrow(
      RootEliminatedError
    );
  });
});

describe('loadSchema', () => {
  it('should honor stop words in index and query alike', () => {
    const source = 'type Item={name:"The Works"}|{name:"latte"};';

    expect(shrinkSchema(loadSchema(source), { root: 'Item', phrase: 'the latte' }).text).toBe(
      'type Item={name:"The Works"}|{name:"latte"};'
    );
    expect(
      shrinkSchema(loadSchema(source, { stopWords: true }), { root: 'Item', phrase: 'the latte' }).text
    ).toBe('type Item={name:"latte"};');
  });
});
