/**
 * typeprune - shrink TypeScript type schemas to what a query needs
 *
 * @packageDocumentation
 */

export type {
  Declaration,
  Field,
  ParsedSchema,
  TypeExpr,
  TypeGraph,
  TypeParam,
} from './core/types.js';
export {
  SchemaError,
  SchemaSyntaxError,
  DuplicateDeclarationError,
  DanglingReferenceError,
  ArityMismatchError,
  RootEliminatedError,
  UnknownRootError,
  ConfigError,
  CartFormatError,
} from './core/errors.js';
export { tokenize } from './parser/lexer.js';
export { parseSchema } from './parser/parser.js';
export { buildGraph } from './graph/build.js';
export { traverseGraph } from './graph/traverse.js';
export { normalizeTerms } from './search/normalize.js';
export { buildIndex, occurrenceKey, type LiteralIndex, type Occurrence } from './search/indexer.js';
export { matchQuery, liveOccurrences, queryTerms, highlightMatches, type LiveSet } from './search/query.js';
export { collectCartLiterals, type CartValue } from './search/cart.js';
export { pruneGraph } from './prune/prune.js';
export { compressGraph } from './prune/compress.js';
export { formatExpr, formatDeclaration, serializeGraph } from './export/serialize.js';
export { loadSchema, shrinkSchema, type LoadedSchema, type ShrinkRequest } from './pipeline.js';
export { loadConfig, type Config } from './storage/config.js';
export { loadSchemaFile, loadCartFile } from './storage/files.js';
