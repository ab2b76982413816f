/**
 * Literal collection over an in-progress cart.
 *
 * The walker knows nothing about the schema; it only distinguishes
 * mappings, sequences and scalars.
 */

export type CartScalar = string | number | boolean | null;

export type CartValue = CartScalar | readonly CartValue[] | { readonly [key: string]: CartValue };

/**
 * Check that an arbitrary parsed document is made only of mappings,
 * sequences and scalars.
 */
export function isCartValue(value: unknown): value is CartValue {
  if (value === null) return true;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return true;
  }
  if (Array.isArray(value)) return value.every(isCartValue);
  if (typeof value === 'object') return Object.values(value).every(isCartValue);
  return false;
}

function isSequence(value: CartValue): value is readonly CartValue[] {
  return Array.isArray(value);
}

/**
 * Every string value in the cart, depth first: mapping entries in key
 * insertion order, sequence items in index order.
 */
export function collectCartLiterals(cart: CartValue): string[] {
  const literals: string[] = [];

  function walk(value: CartValue) {
    if (typeof value === 'string') {
      literals.push(value);
    } else if (isSequence(value)) {
      for (const item of value) walk(item);
    } else if (value !== null && typeof value === 'object') {
      for (const item of Object.values(value)) walk(item);
    }
  }

  walk(cart);
  return literals;
}
