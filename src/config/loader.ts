/**
 * @fileoverview Config discovery and loading
 *
 * The config file is looked up in the working directory and then in each
 * parent up to the filesystem root; the first readable match wins. Its
 * content may be JSON or YAML (JSON being a YAML subset, one parser reads
 * both).
 */

import { constants } from 'node:fs';
import { access, readFile, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { ConfigError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { BibsearchConfigSchema, type BibsearchConfig, type BibsearchConfigInput } from './schema.js';

export const CONFIG_FILE_NAME = '.bibsearch.json';

export const DEFAULT_CONFIG: BibsearchConfigInput = {
  sources: [
    { remote: 'dblp.org', enabled: true },
    { glob: '/path/to/lots/of/**/*.bib', enabled: true },
    { glob: '/path/to/sample.bib', enabled: false },
    { glob: '/path/to/another/sample.bib' },
    { glob: 'reference.bib', access: 'rw', enabled: true },
  ],
};

export interface LoadedConfig {
  /** Absolute path of the file the config was read from */
  source: string;
  config: BibsearchConfig;
}

async function isReadableFile(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.R_OK);
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Find `fileName` in `startDir` or the nearest ancestor. An absolute
 * `fileName` is checked on its own. Returns `null` when nothing is found.
 */
export async function findConfigFile(fileName: string, startDir: string = process.cwd()): Promise<string | null> {
  if (path.isAbsolute(fileName)) {
    return (await isReadableFile(fileName)) ? fileName : null;
  }

  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, fileName);
    if (await isReadableFile(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Validate already-parsed config content. */
export function parseConfig(raw: unknown, configPath: string): BibsearchConfig {
  const result = BibsearchConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(configPath, `invalid configuration (${issues.length} issue${issues.length === 1 ? '' : 's'})`, issues);
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<BibsearchConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigError(configPath, `cannot read file: ${getErrorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error: unknown) {
    throw new ConfigError(configPath, `cannot parse file: ${getErrorMessage(error)}`);
  }

  const config = parseConfig(raw, configPath);
  logDebug('Loaded config', { path: configPath, sources: config.sources.length });
  return config;
}

/** Find and load the config, or return `null` if no file exists. */
export async function resolveConfig(fileName: string, startDir?: string): Promise<LoadedConfig | null> {
  const source = await findConfigFile(fileName, startDir);
  if (!source) return null;
  return { source, config: await loadConfig(source) };
}

export async function writeDefaultConfig(filePath: string): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(DEFAULT_CONFIG, null, 4)}\n`, 'utf8');
}
