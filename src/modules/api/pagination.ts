import type { PageResponse, PaginatedBody } from '../../types/types';
import { nextPageUrl } from './linkHeader';

export interface PageFetcher {
	fetchPage(url: string, headers: Record<string, string>): Promise<PageResponse>;
}

/**
 * Walk a `rel="next"` chain starting at `url`, handing each page to `visit`
 * in link order. Stops at the first page without a next link.
 */
export async function forEachPage(
	fetcher: PageFetcher,
	url: string,
	headers: Record<string, string>,
	visit: (page: PageResponse) => void
): Promise<number> {
	let pages = 0;
	let current: string | undefined = url;
	while (current !== undefined) {
		const page = await fetcher.fetchPage(current, headers);
		visit(page);
		pages++;
		current = nextPageUrl(page.headers.get('link'), page.url);
	}
	return pages;
}

/** Fetch every page and concatenate the bodies as-is. */
export async function fetchAllPages(
	fetcher: PageFetcher,
	url: string,
	headers: Record<string, string>
): Promise<PaginatedBody> {
	const chunks: string[] = [];
	const pages = await forEachPage(fetcher, url, headers, (page) => {
		chunks.push(page.body);
	});
	return { body: chunks.join(''), pages };
}

/** Fetch every page of a JSON array endpoint and flatten the arrays. */
export async function fetchAllJsonPages(
	fetcher: PageFetcher,
	url: string,
	headers: Record<string, string>
): Promise<unknown[]> {
	const entries: unknown[] = [];
	await forEachPage(fetcher, url, headers, (page) => {
		const parsed: unknown = JSON.parse(page.body);
		if (!Array.isArray(parsed)) {
			throw new TypeError(`Expected a JSON array from ${page.url}`);
		}
		entries.push(...parsed);
	});
	return entries;
}
