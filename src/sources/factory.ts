import type { BibliographyCodec } from '../bibtex/types.js';
import { isLocalSourceConfig, type BibsearchConfig, type SourceConfig } from '../config/schema.js';
import type { SourceRegistration } from '../coordinator/search_coordinator.js';
import { createLocalSource } from './local_source.js';
import { createRemoteSource, type FetchLike } from './remote_source.js';
import type { Source } from './types.js';

export interface SourceFactoryDeps {
  codec: BibliographyCodec;
  fetch?: FetchLike;
  yieldEvery?: number;
}

export function createSource(config: SourceConfig, deps: SourceFactoryDeps): Source {
  if (isLocalSourceConfig(config)) {
    return createLocalSource({ pattern: config.glob, codec: deps.codec, yieldEvery: deps.yieldEvery });
  }
  return createRemoteSource({
    endpoint: config.remote,
    codec: deps.codec,
    fetch: deps.fetch,
    maxHits: config.maxHits,
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Build the coordinator's source list: read-only sources in config order,
 * followed by the read-write source.
 */
export function createRegistrations(config: BibsearchConfig, deps: SourceFactoryDeps): SourceRegistration[] {
  const yieldEvery = deps.yieldEvery ?? config.search?.yieldEvery;
  const readOnly: SourceRegistration[] = [];
  const readWrite: SourceRegistration[] = [];

  for (const entry of config.sources) {
    const source = createSource(entry, { ...deps, yieldEvery });
    if (isLocalSourceConfig(entry) && entry.access === 'rw') {
      readWrite.push({ source, access: 'rw', enabled: entry.enabled });
    } else {
      readOnly.push({ source, access: 'ro', enabled: entry.enabled });
    }
  }
  return [...readOnly, ...readWrite];
}
