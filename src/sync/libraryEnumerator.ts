import { z } from 'zod';

import { USER_LIBRARY_FILE } from '../constants/constants';
import { fetchAllJsonPages, type PageFetcher } from '../modules/api/pagination';
import { authHeaders, type SyncConfig } from '../modules/config';
import type { Logger } from '../modules/logging';
import type { Resource, ZoteroGroupListItem } from '../types/types';

type LibraryConfig = Pick<SyncConfig, 'apiBaseUrl' | 'userId' | 'bearerToken'>;

const idSchema = z.union([z.number(), z.string()]);

const groupListItemSchema: z.ZodType<ZoteroGroupListItem> = z.object({
	id: idSchema.optional(),
	name: z.string().optional(),
	data: z
		.object({
			id: idSchema.optional(),
			name: z.string().optional(),
		})
		.optional(),
});

function itemsUrl(config: LibraryConfig, libraryPath: string): string {
	return `${config.apiBaseUrl}/${libraryPath}/items?v=3&format=biblatex`;
}

export function userLibraryResource(config: LibraryConfig): Resource {
	return {
		url: itemsUrl(config, `users/${encodeURIComponent(config.userId)}`),
		headers: authHeaders(config),
		outputName: USER_LIBRARY_FILE,
		label: `user:${config.userId}`,
	};
}

export function groupResource(config: LibraryConfig, groupId: string, name?: string): Resource {
	return {
		url: itemsUrl(config, `groups/${encodeURIComponent(groupId)}`),
		headers: authHeaders(config),
		outputName: `${groupId}.bib`,
		label: name ? `group:${groupId} (${name})` : `group:${groupId}`,
	};
}

/** Group id of a listing entry, or undefined when it has none. */
export function groupIdOf(group: ZoteroGroupListItem): string | undefined {
	const id = group.id ?? group.data?.id;
	if (id === undefined || id === '' || id === 0) {
		return undefined;
	}
	return String(id);
}

/** One resource per group the user belongs to, in listing order. */
export async function listGroupResources(
	fetcher: PageFetcher,
	config: LibraryConfig,
	logger: Logger
): Promise<Resource[]> {
	const url = `${config.apiBaseUrl}/users/${encodeURIComponent(config.userId)}/groups/`;
	const entries = await fetchAllJsonPages(fetcher, url, authHeaders(config));

	const resources: Resource[] = [];
	for (const entry of entries) {
		const parsed = groupListItemSchema.safeParse(entry);
		if (!parsed.success) {
			logger.debug('Skipping malformed group entry', parsed.error.issues);
			continue;
		}
		const groupId = groupIdOf(parsed.data);
		if (!groupId) continue;
		resources.push(groupResource(config, groupId, parsed.data.data?.name ?? parsed.data.name));
	}
	logger.debug(`Found ${resources.length} group libraries`);
	return resources;
}

/** The personal library followed by every group library. */
export async function listResources(
	fetcher: PageFetcher,
	config: LibraryConfig,
	logger: Logger
): Promise<Resource[]> {
	return [userLibraryResource(config), ...(await listGroupResources(fetcher, config, logger))];
}
