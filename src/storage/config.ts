/**
 * Project configuration, read from typeprune.yaml.
 */

import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { CONFIG_FILE, findProjectRoot } from './files.js';

const ConfigSchema = z
  .object({
    schema: z.string().min(1).optional(),
    root: z.string().min(1).optional(),
    compress: z.boolean().default(true),
    preserveTemplates: z.boolean().default(false),
    stopWords: z.boolean().default(false),
    onRootEliminated: z.enum(['error', 'unpruned']).default('error'),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigSchema>;

export interface Config extends ConfigFile {
  /** Directory relative paths resolve against. */
  baseDir: string;
  /** Absolute path of the file the settings came from, if any. */
  configPath?: string;
}

/**
 * Validate raw configuration content. `filePath` is only used in messages.
 */
export function parseConfig(content: string, filePath: string): ConfigFile {
  const raw: unknown = parse(content) ?? {};
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      filePath,
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}

/**
 * Load configuration for the project containing `startDir`. Without a
 * config file, every setting takes its default.
 */
export function loadConfig(startDir: string = process.cwd()): Config {
  const root = findProjectRoot(startDir);
  if (!root) {
    return { ...ConfigSchema.parse({}), baseDir: resolve(startDir) };
  }
  const configPath = join(root, CONFIG_FILE);
  const settings = parseConfig(readFileSync(configPath, 'utf-8'), configPath);
  return { ...settings, baseDir: root, configPath };
}

/**
 * Resolve a path from the configuration against its base directory.
 */
export function resolveConfigPath(config: Config, filePath: string): string {
  return resolve(config.baseDir, filePath);
}
