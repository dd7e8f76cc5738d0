/**
 * @fileoverview Glob-backed local bibliography source
 *
 * Loads every `.bib` file a glob pattern matches and filters the parsed
 * records in memory. A pattern that matches nothing leaves the source in
 * `no_file`; a matched file that fails to parse is logged and skipped, and the
 * source still becomes `ready`, possibly with zero records.
 */

import { homedir } from 'node:os';
import { glob } from 'glob';
import type { BibliographyCodec } from '../bibtex/types.js';
import { BibRecord } from '../records/bib_record.js';
import { matchesTokens, significantTokens } from '../records/query.js';
import { logDebug, logError, logWarning } from '../telemetry/logger.js';
import { yieldToEventLoop } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import type { LoadOutcome, LocalSource } from './types.js';

export interface LocalSourceOptions {
  /** Glob pattern; `~` and `$VAR` / `${VAR}` are expanded */
  pattern: string;
  codec: BibliographyCodec;
  /** Records scanned between event-loop yields during a search (default: 500) */
  yieldEvery?: number;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

const DEFAULT_YIELD_EVERY = 500;

/**
 * Expand a leading `~` and environment references. Unknown variables are left
 * as written.
 */
export function expandPattern(
  pattern: string,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = homedir(),
): string {
  const withHome = pattern === '~' || pattern.startsWith('~/') ? homeDir + pattern.slice(1) : pattern;
  return withHome.replace(/\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g, (match, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    if (name === undefined) return match;
    const value = env[name];
    return value === undefined ? match : value;
  });
}

class GlobBibSource implements LocalSource {
  readonly kind = 'local' as const;
  readonly origin: string;

  private readonly codec: BibliographyCodec;
  private readonly yieldEvery: number;
  private matchedFiles: string[] = [];
  private loaded: BibRecord[] = [];
  private loading: Promise<LoadOutcome> | null = null;

  constructor(options: LocalSourceOptions) {
    this.origin = expandPattern(options.pattern, options.env, options.homeDir);
    this.codec = options.codec;
    this.yieldEvery = Math.max(1, options.yieldEvery ?? DEFAULT_YIELD_EVERY);
  }

  get files(): readonly string[] {
    return this.matchedFiles;
  }

  records(): readonly BibRecord[] {
    return this.loaded;
  }

  load(): Promise<LoadOutcome> {
    if (!this.loading) {
      this.loading = this.loadOnce();
    }
    return this.loading;
  }

  private async loadOnce(): Promise<LoadOutcome> {
    logDebug(`Collecting entries from glob expression '${this.origin}'`);
    const files = await glob(this.origin, { absolute: true, nodir: true });
    this.matchedFiles = [...files].sort();

    if (this.matchedFiles.length === 0) {
      logWarning(`Glob expression '${this.origin}' matches no file`);
      return 'no_file';
    }

    for (const filePath of this.matchedFiles) {
      try {
        const entries = await this.codec.parseFile(filePath);
        for (const [key, entry] of entries) {
          this.loaded.push(BibRecord.fromEntry(this.origin, filePath, key, entry));
        }
        logDebug(`Parsed ${entries.size} entries from file ${filePath}`);
      } catch (error: unknown) {
        logError(`Skipping ${filePath}: ${getErrorMessage(error)}`, { source: this.origin });
      }
    }
    return 'ready';
  }

  async *search(text: string, _generation: number): AsyncGenerator<BibRecord> {
    const tokens = significantTokens(text);
    if (tokens.length === 0) return;

    let scanned = 0;
    for (const record of this.loaded) {
      if (matchesTokens(record, tokens)) {
        yield record;
      }
      scanned += 1;
      if (scanned % this.yieldEvery === 0) {
        await yieldToEventLoop();
      }
    }
  }
}

export function createLocalSource(options: LocalSourceOptions): LocalSource {
  return new GlobBibSource(options);
}
