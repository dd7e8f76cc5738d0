/**
 * @fileoverview CLI entry logic
 *
 * Kept apart from the bin script so it can be driven in-process: every
 * outcome is an exit code, and nothing here calls `process.exit`.
 */

import { tmpdir, userInfo } from 'node:os';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { CitationJsCodec } from '../bibtex/codec.js';
import { CONFIG_FILE_NAME, resolveConfig, writeDefaultConfig, type LoadedConfig } from '../config/loader.js';
import { SearchCoordinator } from '../coordinator/search_coordinator.js';
import { createRegistrations } from '../sources/factory.js';
import type { FetchLike } from '../sources/remote_source.js';
import { configureLogger, logInfo } from '../telemetry/logger.js';
import { TerminalApp } from '../ui/terminal_app.js';
import { getErrorMessage, wrapError } from '../utils/errors.js';
import { createError, formatError, getExitCode } from './errors.js';
import { getHelp } from './help.js';

export const BIBSEARCH_VERSION = '0.1.0';

export interface CliOptions {
  config: string;
  genConfig: boolean;
  log: string;
  keysOutput?: string;
  version: boolean;
  help: boolean;
}

export interface CliIo {
  cwd?: string;
  out?: (text: string) => void;
  err?: (text: string) => void;
  /** Whether stdin is an interactive terminal (default: `process.stdin.isTTY`) */
  interactive?: boolean;
  fetch?: FetchLike;
}

export function defaultLogPath(): string {
  let user = 'user';
  try {
    user = userInfo().username;
  } catch {
    // no passwd entry for the uid
  }
  return path.join(tmpdir(), `${user}_bibsearch.log`);
}

export function parseCliArgs(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'f', default: CONFIG_FILE_NAME },
        'gen-config': { type: 'boolean', short: 'g', default: false },
        log: { type: 'string', short: 'l', default: defaultLogPath() },
        'keys-output': { type: 'string', short: 'k' },
        version: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: false,
      strict: true,
    });
    return {
      config: values.config,
      genConfig: values['gen-config'],
      log: values.log,
      keysOutput: values['keys-output'],
      version: values.version,
      help: values.help,
    };
  } catch (error: unknown) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const out = io.out ?? ((text: string) => console.log(text));
  const err = io.err ?? ((text: string) => console.error(text));
  const cwd = io.cwd ?? process.cwd();

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error: unknown) {
    err(formatError(error));
    return getExitCode(error);
  }

  if (options.help) {
    out(getHelp());
    return 0;
  }
  if (options.version) {
    out(`bibsearch ${BIBSEARCH_VERSION}`);
    return 0;
  }
  if (options.genConfig) {
    try {
      await writeDefaultConfig(path.resolve(cwd, options.config));
    } catch (error: unknown) {
      err(formatError(wrapError(error, `Cannot write ${options.config}`)));
      return 1;
    }
    out(`Wrote default config to file ${options.config}`);
    return 0;
  }

  configureLogger({ filePath: path.resolve(cwd, options.log), level: 'debug' });

  let loaded: LoadedConfig | null;
  try {
    loaded = await resolveConfig(options.config, cwd);
  } catch (error: unknown) {
    err(formatError(error));
    return getExitCode(error);
  }
  if (!loaded) {
    const error = createError('CONFIG_NOT_FOUND', 'Did not find any config file.', { name: options.config });
    err(formatError(error));
    return getExitCode(error);
  }

  const interactive = io.interactive ?? Boolean(process.stdin.isTTY);
  if (!interactive) {
    const error = createError('TERMINAL_REQUIRED', 'stdin is not a terminal.');
    err(formatError(error));
    return getExitCode(error);
  }

  const codec = new CitationJsCodec();
  const coordinator = new SearchCoordinator({
    sources: createRegistrations(loaded.config, { codec, fetch: io.fetch }),
    codec,
    keysOutput: options.keysOutput ?? loaded.config.keysOutput,
  });
  logInfo('Starting', { config: loaded.source, sources: coordinator.sources.length });

  const app = new TerminalApp({ coordinator, configSource: loaded.source });
  const reason = await app.run();
  logInfo('Exiting', { reason });
  return 0;
}
