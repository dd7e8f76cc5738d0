/**
 * @fileoverview DBLP-style remote bibliography source
 *
 * One HTTP round trip per search against `<endpoint>/search/publ/api`. The
 * response is decoded with zod into records; "no hits" is an empty result,
 * and any transport, status or decode failure is logged and also yields an
 * empty result. Full BibTeX entries are fetched lazily per record from
 * `<endpoint>/rec/<key>.bib` when the record is resolved.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { BibliographyCodec, CslEntry } from '../bibtex/types.js';
import { RemoteSearchError } from '../core/errors.js';
import { BibRecord } from '../records/bib_record.js';
import { logDebug, logError } from '../telemetry/logger.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import type { LoadOutcome, RemoteSource } from './types.js';

export type FetchLike = (
  url: string,
  init?: { headers?: Record<string, string>; signal?: AbortSignal },
) => Promise<Response>;

export interface RemoteSourceOptions {
  /** Base URL, e.g. https://dblp.org */
  endpoint: string;
  codec: BibliographyCodec;
  fetch?: FetchLike;
  /** Maximum hits requested per search (default: 30) */
  maxHits?: number;
  /** Per-request timeout in ms (default: 10000, 0 disables) */
  timeoutMs?: number;
}

export const DEFAULT_MAX_HITS = 30;
export const DEFAULT_TIMEOUT_MS = 10_000;

// ============================================================================
// RESPONSE SCHEMA
// ============================================================================

const AuthorSchema = z.union([z.string(), z.object({ text: z.string() }).passthrough()]);

const oneOrMany = <T extends z.ZodTypeAny>(schema: T) => z.union([schema, z.array(schema)]);

const HitInfoSchema = z
  .object({
    key: z.string(),
    title: z.string().optional(),
    venue: oneOrMany(z.string()).optional(),
    year: z.union([z.string(), z.number()]).optional(),
    ee: oneOrMany(z.string()).optional(),
    url: z.string().optional(),
    authors: z.object({ author: oneOrMany(AuthorSchema) }).passthrough().optional(),
  })
  .passthrough();

const SearchResponseSchema = z.object({
  result: z
    .object({
      hits: z
        .object({
          hit: z.array(z.object({ info: HitInfoSchema }).passthrough()).optional(),
        })
        .passthrough(),
    })
    .passthrough(),
});

export type HitInfo = z.infer<typeof HitInfoSchema>;

// ============================================================================
// DECODING
// ============================================================================

function firstOf<T>(value: T | T[] | undefined): T | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value[0] : value;
}

function asArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Short record key derived from the flat remote key: its last path segment
 * plus the first four hex digits of its SHA-1, upper-cased.
 */
export function shortKey(flatKey: string): string {
  const base = flatKey.split('/').pop() ?? flatKey;
  const digest = createHash('sha1').update(flatKey, 'utf8').digest('hex');
  return `${base}:${digest.slice(0, 4).toUpperCase()}`;
}

export function decodeSearchResponse(payload: unknown, endpoint: string): HitInfo[] {
  const parsed = SearchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const paths = parsed.error.issues.map((issue) => issue.path.join('.') || '<root>');
    throw new RemoteSearchError(endpoint, 'decode', `unexpected response shape at ${paths.join(', ')}`);
  }
  return (parsed.data.result.hits.hit ?? []).map((hit) => hit.info);
}

// ============================================================================
// SOURCE
// ============================================================================

class HttpBibSource implements RemoteSource {
  readonly kind = 'remote' as const;
  readonly origin: string;

  private readonly codec: BibliographyCodec;
  private readonly fetchImpl: FetchLike;
  private readonly maxHits: number;
  private readonly timeoutMs: number;

  constructor(options: RemoteSourceOptions) {
    this.origin = options.endpoint.replace(/\/+$/, '');
    this.codec = options.codec;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.maxHits = Math.max(1, options.maxHits ?? DEFAULT_MAX_HITS);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async load(): Promise<LoadOutcome> {
    return 'ready';
  }

  async *search(text: string, generation: number): AsyncGenerator<BibRecord> {
    if (text.trim().length === 0) return;

    let hits: HitInfo[];
    try {
      const url = `${this.origin}/search/publ/api?q=${encodeURIComponent(text)}&format=json&h=${this.maxHits}`;
      hits = decodeSearchResponse(await this.request(url, 'json'), this.origin);
    } catch (error: unknown) {
      logError('Remote search failed', {
        source: this.origin,
        generation,
        error: getErrorMessage(error),
      });
      return;
    }

    logDebug(`Remote search returned ${hits.length} hits`, { source: this.origin, generation });
    for (const info of hits) {
      yield this.toRecord(info);
    }
  }

  private toRecord(info: HitInfo): BibRecord {
    const authors = asArray(info.authors?.author).map((author) =>
      typeof author === 'string' ? author : author.text,
    );
    return new BibRecord({
      origin: this.origin,
      key: shortKey(info.key),
      authors,
      title: info.title,
      year: info.year === undefined ? undefined : String(info.year),
      venue: firstOf(info.venue),
      url: firstOf(info.ee) ?? info.url,
      resolver: () => this.fetchEntry(info.key),
    });
  }

  private async fetchEntry(flatKey: string): Promise<CslEntry> {
    const url = `${this.origin}/rec/${flatKey}.bib`;
    const text = await this.request(url, 'text');
    const entries = this.codec.parseText(text, url);
    const entry = entries.get(`DBLP:${flatKey}`) ?? entries.values().next().value;
    if (!entry) {
      throw new RemoteSearchError(this.origin, 'missing_entry', `no BibTeX entry in ${url}`);
    }
    return entry;
  }

  private request(url: string, kind: 'json'): Promise<unknown>;
  private request(url: string, kind: 'text'): Promise<string>;
  private async request(url: string, kind: 'json' | 'text'): Promise<unknown> {
    let response: Response;
    try {
      response = await withTimeout(
        this.fetchImpl(url, {
          headers: { Accept: kind === 'json' ? 'application/json' : 'text/plain' },
          // The signal closes the connection; withTimeout only stops the wait.
          signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined,
        }),
        this.timeoutMs,
        { context: `GET ${url}` },
      );
    } catch (error: unknown) {
      // fetch rejects with a DOMException named TimeoutError when the signal fires.
      const timedOut = error instanceof TimeoutError || (error instanceof Error && error.name === 'TimeoutError');
      const reason = timedOut ? 'timeout' : 'transport';
      throw new RemoteSearchError(this.origin, reason, getErrorMessage(error));
    }
    if (!response.ok) {
      throw new RemoteSearchError(this.origin, 'http_status', `GET ${url} returned ${response.status}`);
    }
    if (kind === 'text') {
      return response.text();
    }
    try {
      return await response.json();
    } catch (error: unknown) {
      throw new RemoteSearchError(this.origin, 'decode', getErrorMessage(error));
    }
  }
}

export function createRemoteSource(options: RemoteSourceOptions): RemoteSource {
  return new HttpBibSource(options);
}
