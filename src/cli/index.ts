#!/usr/bin/env node
/**
 * typeprune CLI - load, inspect and prune type schemas.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { RootEliminatedError, SchemaError, SchemaSyntaxError } from '../core/errors.js';
import { serializeGraph } from '../export/serialize.js';
import { traverseGraph } from '../graph/traverse.js';
import { shrinkSchema, type LoadedSchema } from '../pipeline.js';
import type { CartValue } from '../search/cart.js';
import { highlightMatches, liveOccurrences, matchQuery, queryTerms } from '../search/query.js';
import { loadConfig, resolveConfigPath, type Config } from '../storage/config.js';
import { loadCartFile, loadSchemaFile } from '../storage/files.js';

interface FormatOptions {
  templates?: boolean;
}

interface PruneOptions {
  root?: string;
  query?: string;
  cart?: string;
  compress: boolean;
  templates?: boolean;
  verbose?: boolean;
}

interface RefsOptions {
  upstream?: boolean;
  depth?: string;
}

/**
 * Print a library error and exit; anything else is a bug and propagates.
 */
function fail(error: unknown): never {
  if (error instanceof SchemaSyntaxError) {
    console.error(chalk.red(`Syntax error: ${error.message}`));
  } else if (error instanceof SchemaError) {
    console.error(chalk.red(error.message));
  } else {
    throw error;
  }
  process.exit(1);
}

function run(action: () => void) {
  try {
    action();
  } catch (error) {
    fail(error);
  }
}

function openSchema(config: Config, schemaPath: string | undefined): LoadedSchema {
  const path = schemaPath ?? config.schema;
  if (!path) {
    console.error(chalk.red('No schema given and none configured in typeprune.yaml'));
    process.exit(1);
  }
  return loadSchemaFile(resolveConfigPath(config, path), { stopWords: config.stopWords });
}

const program = new Command();

program
  .name('typeprune')
  .description('Shrink TypeScript type schemas to the branches relevant to a query')
  .version('0.1.0');

// Check command
program
  .command('check <schema>')
  .description('Parse and validate a schema')
  .action((schemaPath: string) => {
    run(() => {
      const config = loadConfig();
      const schema = openSchema(config, schemaPath);
      console.log(chalk.green(`OK: ${schema.graph.order.length} declarations`));
      console.log(chalk.gray(`${schema.index.occurrences.size} indexed literals, ${schema.index.pinned.size} pinned`));
    });
  });

// Format command
program
  .command('format <schema>')
  .description('Print a schema in compact form')
  .option('--templates', 'Keep LITERAL<...> forms instead of plain strings')
  .action((schemaPath: string, options: FormatOptions) => {
    run(() => {
      const config = loadConfig();
      const schema = openSchema(config, schemaPath);
      console.log(
        serializeGraph(schema.graph, {
          preserveTemplates: options.templates ?? config.preserveTemplates,
        })
      );
    });
  });

// Prune command
program
  .command('prune [schema]')
  .description('Prune a schema for a query phrase and cart')
  .option('-r, --root <name>', 'Root type (defaults to the configured root)')
  .option('-q, --query <phrase>', 'Free-text query phrase', '')
  .option('-c, --cart <file>', 'Cart file (YAML or JSON)')
  .option('--no-compress', 'Keep forwarding declarations')
  .option('--templates', 'Keep LITERAL<...> forms instead of plain strings')
  .option('-v, --verbose', 'Report sizes before and after pruning')
  .action((schemaPath: string | undefined, options: PruneOptions) => {
    run(() => {
      const config = loadConfig();
      const schema = openSchema(config, schemaPath);
      const root = options.root ?? config.root;
      if (!root) {
        console.error(chalk.red('No root type given (use --root or set root in typeprune.yaml)'));
        process.exit(1);
      }

      const cart: CartValue | undefined = options.cart ? loadCartFile(options.cart) : undefined;
      const preserveTemplates = options.templates ?? config.preserveTemplates;

      try {
        const result = shrinkSchema(schema, {
          root,
          phrase: options.query ?? '',
          cart,
          compress: options.compress && config.compress,
          preserveTemplates,
        });
        console.log(result.text);

        if (options.verbose) {
          const original = serializeGraph(schema.graph, { root, preserveTemplates });
          console.error(chalk.gray(`Live occurrences: ${result.live.size}`));
          console.error(
            chalk.gray(`Declarations: ${traverseGraph(root, schema.graph).length} → ${result.graph.order.length}`)
          );
          console.error(chalk.gray(`Characters: ${original.length} → ${result.text.length}`));
        }
      } catch (error) {
        if (!(error instanceof RootEliminatedError) || config.onRootEliminated !== 'unpruned') {
          throw error;
        }
        console.error(chalk.yellow(`${error.message}; printing the unpruned schema`));
        console.log(serializeGraph(schema.graph, { root, preserveTemplates }));
      }
    });
  });

// Match command
program
  .command('match <phrase>')
  .description('List the schema literals a phrase matches')
  .option('-s, --schema <file>', 'Schema file (defaults to the configured schema)')
  .action((phrase: string, options: { schema?: string }) => {
    run(() => {
      const config = loadConfig();
      const schema = openSchema(config, options.schema);
      const occurrences = liveOccurrences(schema.index, matchQuery(schema.index, phrase));

      if (occurrences.length === 0) {
        console.log(chalk.yellow('No literals matched'));
        return;
      }
      const terms = queryTerms(schema.index, phrase);
      const highlight = (text: string) =>
        highlightMatches(schema.index, JSON.stringify(text), terms, (word) => chalk.bold.yellow(word));
      for (const occurrence of occurrences) {
        const pin = occurrence.pinned ? chalk.gray(' [pinned]') : '';
        const aliases =
          occurrence.aliases.length > 0
            ? chalk.gray(' aka ') + occurrence.aliases.map(highlight).join(', ')
            : '';
        console.log(`${chalk.cyan(occurrence.declaration)} ${highlight(occurrence.value)}${aliases}${pin}`);
      }
    });
  });

// Refs command
program
  .command('refs <name>')
  .description('List declarations reached from a type')
  .option('-s, --schema <file>', 'Schema file (defaults to the configured schema)')
  .option('-u, --upstream', 'Follow referrers instead of references')
  .option('-d, --depth <n>', 'Maximum depth')
  .action((name: string, options: RefsOptions & { schema?: string }) => {
    run(() => {
      const config = loadConfig();
      const schema = openSchema(config, options.schema);
      if (!schema.graph.declarations.has(name)) {
        console.error(chalk.red(`Type not found: ${name}`));
        process.exit(1);
      }
      const depth = options.depth === undefined ? Infinity : parseInt(options.depth, 10);
      const names = traverseGraph(
        name,
        schema.graph,
        options.upstream ? 'upstream' : 'downstream',
        depth
      );
      for (const reached of names) {
        console.log(reached === name ? chalk.cyan(reached) : `  ${reached}`);
      }
    });
  });

program.parse();
