export { loadAppEnv, importSettingsFrom, type AppEnv, type ImportSettings } from './config.js';
export { logger, configureLogger, type Logger } from './logger.js';
export * from './errors.js';

export * from './snapshot/types.js';
export { serialize, deserialize } from './snapshot/codec.js';
export { readSnapshotFile, writeSnapshotFile, findLatestSnapshot } from './snapshot/snapshot-file.js';

export * from './import/types.js';
export { normalizeString, foldString, tokenSetRatio, cleanSearchText } from './import/similarity.js';
export { DEFAULT_MATCH_OPTIONS, scoreCandidate, resolve } from './import/matcher.js';
export { CandidateSearchAdapter, buildSearchQuery, DEFAULT_SEARCH_LIMIT } from './import/candidate-search.js';
export {
  RateLimitedInvoker,
  DEFAULT_RETRY_POLICY,
  classifyFailure,
  type RetryPolicy,
  type InvokerDependencies,
  type CallFailure
} from './import/rate-limited-invoker.js';
export { MutationApplier, type MutationApplierOptions, type PlaylistMappings } from './import/mutation-applier.js';
export { createFileOutcomeSink, toLogEntry, type OutcomeSink, type OutcomeLogEntry } from './import/outcome-log.js';
export {
  ImportSession,
  countOutcomes,
  unresolvedRecords,
  type ImportSessionDependencies,
  type RunOptions
} from './import/import-session.js';

export * from './catalog/types.js';
export { TidalClient, type TidalClientOptions } from './catalog/tidal.js';
export { SpotifyClient } from './catalog/spotify.js';
export { connectSpotify, connectTidal, maskSecret } from './catalog/session.js';

export {
  EXPORT_KINDS,
  RECORD_KIND_FOR,
  exportLibrary,
  isExportKind,
  snapshotFileName,
  type ExportKind,
  type ExportOptions,
  type ExportSummary
} from './export/exporter.js';
export { formatUserError } from './utils/error-formatter.js';
