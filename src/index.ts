export { fetchAllJsonPages, fetchAllPages, forEachPage, type PageFetcher } from './modules/api/pagination';
export { nextPageUrl, parseLinkHeader } from './modules/api/linkHeader';
export { ZoteroClient, type FetchLike, type ZoteroClientOptions } from './modules/api/zoteroClient';
export { authHeaders, loadConfig, type ConfigOverrides, type RetryPolicy, type SyncConfig } from './modules/config';
export {
	AccessDeniedError,
	CacheReadError,
	ConfigError,
	FetchError,
	SyncError,
	SyncErrorCode,
} from './modules/errors';
export { createLogger, silentLogger, type Level, type Logger, type LogSink } from './modules/logging';
export { BibliographyStore } from './modules/storage/bibliographyStore';
export { VersionCache } from './modules/storage/versionCache';
export { BibliographySync, type ResourceSyncOptions } from './sync/bibliographySync';
export {
	groupResource,
	listGroupResources,
	listResources,
	userLibraryResource,
} from './sync/libraryEnumerator';
export { SyncManager, summarize } from './sync/syncManager';
export type * from './types/types';
export { withRetry, type RetryOptions } from './utils/retry';
