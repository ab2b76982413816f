/**
 * File access for schemas and carts.
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname, resolve } from 'path';
import { parse, YAMLParseError } from 'yaml';
import { CartFormatError } from '../core/errors.js';
import { isCartValue, type CartValue } from '../search/cart.js';
import { loadSchema, type LoadedSchema } from '../pipeline.js';
import type { NormalizeOptions } from '../search/normalize.js';

/**
 * Configuration file name that marks a project root.
 */
export const CONFIG_FILE = 'typeprune.yaml';

/**
 * Find the project root directory by walking up from cwd.
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);
  while (true) {
    if (existsSync(join(dir, CONFIG_FILE))) {
      return dir;
    }
    if (dir === dirname(dir)) return null;
    dir = dirname(dir);
  }
}

/**
 * Read a schema file and load it.
 */
export function loadSchemaFile(filePath: string, options: NormalizeOptions = {}): LoadedSchema {
  const content = readFileSync(filePath, 'utf-8');
  return loadSchema(content, options);
}

/**
 * Read a cart from a YAML or JSON file.
 */
export function loadCartFile(filePath: string): CartValue {
  const content = readFileSync(filePath, 'utf-8');
  let value: unknown;
  try {
    value = parse(content);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new CartFormatError(filePath, error.message);
    }
    throw error;
  }
  if (value === undefined) return null;
  if (!isCartValue(value)) {
    throw new CartFormatError(filePath, 'only mappings, sequences and scalars are allowed');
  }
  return value;
}
