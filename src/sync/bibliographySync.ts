import { LAST_MODIFIED_VERSION_HEADER } from '../constants/constants';
import { fetchAllPages, type PageFetcher } from '../modules/api/pagination';
import { AccessDeniedError, FetchError } from '../modules/errors';
import type { Logger } from '../modules/logging';
import type { BibliographyStore } from '../modules/storage/bibliographyStore';
import type { VersionCache } from '../modules/storage/versionCache';
import type { PageResponse, Resource, SyncOutcome } from '../types/types';

export interface BibliographySyncDeps {
	fetcher: PageFetcher;
	versions: VersionCache;
	store: BibliographyStore;
	logger: Logger;
}

export interface ResourceSyncOptions {
	/** Fetch even when the cached version matches. */
	force?: boolean;
	/** Compare versions only, write nothing. */
	dryRun?: boolean;
}

/**
 * Mirrors one Zotero library into a local `.bib` file.
 *
 * The first page is fetched to learn the library's current version. Only when
 * it differs from the cached marker is the whole export downloaded. The content
 * file is written before the marker, so an interrupted run leaves a stale marker
 * and the next run fetches again.
 */
export class BibliographySync {
	private readonly fetcher: PageFetcher;
	private readonly versions: VersionCache;
	private readonly store: BibliographyStore;
	private readonly logger: Logger;

	constructor(deps: BibliographySyncDeps) {
		this.fetcher = deps.fetcher;
		this.versions = deps.versions;
		this.store = deps.store;
		this.logger = deps.logger;
	}

	async syncResource(resource: Resource, options: ResourceSyncOptions = {}): Promise<SyncOutcome> {
		let probe: PageResponse;
		try {
			probe = await this.fetcher.fetchPage(resource.url, resource.headers);
		} catch (error) {
			if (error instanceof AccessDeniedError) {
				this.logger.error(`Access to library not granted (${resource.label}).`);
				return { status: 'access-denied', resource };
			}
			throw error;
		}

		const latest = latestVersion(probe);
		const cached = await this.versions.read(resource.outputName);

		if (cached === latest && !options.force) {
			this.logger.info(
				`online version ${latest} is not different from cache ${cached}. Done with ${resource.label}!`
			);
			return { status: 'unchanged', resource, version: latest };
		}

		if (options.dryRun) {
			this.logger.info(
				`online version ${latest} differs from cache ${cached}; dry run, ${resource.outputName} left as is`
			);
			return { status: 'would-update', resource, version: latest, previousVersion: cached };
		}

		this.logger.info(
			`online version ${latest} is different from cache ${cached}. Fetching ${resource.label}...`
		);
		const { body, pages } = await fetchAllPages(this.fetcher, resource.url, resource.headers);

		await this.store.write(resource.outputName, body);
		await this.versions.write(resource.outputName, latest);

		return { status: 'updated', resource, version: latest, previousVersion: cached, pages };
	}
}

export function latestVersion(page: PageResponse): number {
	const raw = page.headers.get(LAST_MODIFIED_VERSION_HEADER);
	const value = raw?.trim() ?? '';
	if (!/^\d+$/.test(value)) {
		throw new FetchError(
			page.url,
			`${page.url} answered without a usable ${LAST_MODIFIED_VERSION_HEADER} header (got ${JSON.stringify(raw)})`,
			{ status: page.status }
		);
	}
	return Number.parseInt(value, 10);
}
