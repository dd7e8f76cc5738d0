export { isLocalSource, type LoadOutcome, type LocalSource, type RemoteSource, type Source, type SourceAccess, type SourceKind } from './types.js';
export { createLocalSource, expandPattern, type LocalSourceOptions } from './local_source.js';
export {
  createRemoteSource,
  decodeSearchResponse,
  shortKey,
  DEFAULT_MAX_HITS,
  DEFAULT_TIMEOUT_MS,
  type FetchLike,
  type HitInfo,
  type RemoteSourceOptions,
} from './remote_source.js';
export { createRegistrations, createSource, type SourceFactoryDeps } from './factory.js';
