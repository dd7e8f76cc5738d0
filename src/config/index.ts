/**
 * @fileoverview bibsearch configuration
 *
 * - `schema`: zod schema for `.bibsearch.json`
 * - `loader`: discovery by walking up from the working directory, loading, default file
 */

export {
  BibsearchConfigSchema,
  LocalSourceConfigSchema,
  RemoteSourceConfigSchema,
  SourceConfigSchema,
  isLocalSourceConfig,
  type BibsearchConfig,
  type BibsearchConfigInput,
  type LocalSourceConfig,
  type RemoteSourceConfig,
  type SourceConfig,
} from './schema.js';

export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  parseConfig,
  resolveConfig,
  writeDefaultConfig,
  type LoadedConfig,
} from './loader.js';
