/** Runs the bibliography sync over the personal library and every group library. */
import { ZoteroClient, type FetchLike } from '../modules/api/zoteroClient';
import type { SyncConfig } from '../modules/config';
import type { Logger } from '../modules/logging';
import { BibliographyStore } from '../modules/storage/bibliographyStore';
import { VersionCache } from '../modules/storage/versionCache';
import type { Resource, SyncOutcome, SyncStatus, SyncSummary } from '../types/types';
import { BibliographySync } from './bibliographySync';
import { listGroupResources, listResources, userLibraryResource } from './libraryEnumerator';

export interface SyncManagerOptions {
	fetch?: FetchLike;
	sleep?: (ms: number) => Promise<void>;
}

export class SyncManager {
	private readonly config: SyncConfig;
	private readonly logger: Logger;
	private readonly client: ZoteroClient;
	private readonly bibliographySync: BibliographySync;

	constructor(config: SyncConfig, logger: Logger, options: SyncManagerOptions = {}) {
		this.config = config;
		this.logger = logger;
		this.client = new ZoteroClient({
			logger,
			retry: config.retry,
			requestTimeoutMs: config.requestTimeoutMs,
			fetch: options.fetch,
			sleep: options.sleep,
		});
		this.bibliographySync = new BibliographySync({
			fetcher: this.client,
			versions: new VersionCache(config.outputDir, logger),
			store: new BibliographyStore(config.outputDir, logger),
			logger,
		});
	}

	/** Every library the credentials can see, personal library first. */
	async listLibraries(): Promise<Resource[]> {
		return listResources(this.client, this.config, this.logger);
	}

	/**
	 * Sync the personal library, then each group in turn.
	 * A failing library is logged and recorded; the others still run.
	 */
	async run(): Promise<SyncSummary> {
		const outcomes: SyncOutcome[] = [];

		outcomes.push(await this.syncOne(userLibraryResource(this.config)));

		if (this.config.includeGroups) {
			this.logger.info('Downloading all groups!');
			let groups: Resource[] = [];
			try {
				groups = await listGroupResources(this.client, this.config, this.logger);
			} catch (error) {
				this.logger.error('Failed to list group libraries', error);
				outcomes.push({ status: 'failed', resource: null, error: asError(error) });
			}
			for (const group of groups) {
				outcomes.push(await this.syncOne(group));
			}
		}

		const summary = summarize(outcomes);
		this.logger.info(
			`Done! ${summary.counts.updated} updated, ${summary.counts.unchanged} unchanged, ` +
				`${summary.counts['would-update']} pending, ${summary.counts['access-denied']} denied, ` +
				`${summary.counts.failed} failed`
		);
		return summary;
	}

	private async syncOne(resource: Resource): Promise<SyncOutcome> {
		try {
			return await this.bibliographySync.syncResource(resource, {
				force: this.config.force,
				dryRun: this.config.dryRun,
			});
		} catch (error) {
			this.logger.error(`Sync of ${resource.label} failed`, error);
			return { status: 'failed', resource, error: asError(error) };
		}
	}
}

export function summarize(outcomes: SyncOutcome[]): SyncSummary {
	const counts: Record<SyncStatus, number> = {
		updated: 0,
		unchanged: 0,
		'would-update': 0,
		'access-denied': 0,
		failed: 0,
	};
	for (const outcome of outcomes) {
		counts[outcome.status]++;
	}
	return { outcomes, counts, failed: counts.failed > 0 };
}

function asError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
