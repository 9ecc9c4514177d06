/**
 * Parse an RFC 5988 `Link` header into a map of relation -> target URL.
 *
 * `<https://api.zotero.org/users/1/items?start=25>; rel="next", <...>; rel="last"`
 *
 * A link with several space-separated relations is registered under each one.
 * The first link wins when a relation repeats.
 */
export function parseLinkHeader(header: string | null | undefined): Map<string, string> {
	const links = new Map<string, string>();
	if (!header) {
		return links;
	}

	for (const part of splitLinks(header)) {
		const match = /^\s*<([^>]*)>\s*(.*)$/.exec(part);
		if (!match) continue;
		const [, target, rest] = match;

		for (const param of rest.split(';')) {
			const eq = param.indexOf('=');
			if (eq === -1) continue;
			const name = param.slice(0, eq).trim().toLowerCase();
			if (name !== 'rel') continue;
			const value = param
				.slice(eq + 1)
				.trim()
				.replace(/^"(.*)"$/, '$1');
			for (const rel of value.split(/\s+/)) {
				const key = rel.toLowerCase();
				if (key && !links.has(key)) {
					links.set(key, target);
				}
			}
		}
	}
	return links;
}

// Commas inside <...> belong to the URL.
function splitLinks(header: string): string[] {
	const parts: string[] = [];
	let depth = 0;
	let start = 0;
	for (let i = 0; i < header.length; i++) {
		const ch = header[i];
		if (ch === '<') depth++;
		else if (ch === '>') depth = Math.max(0, depth - 1);
		else if (ch === ',' && depth === 0) {
			parts.push(header.slice(start, i));
			start = i + 1;
		}
	}
	parts.push(header.slice(start));
	return parts.filter((p) => p.trim() !== '');
}

/** Resolve the `next` target of a page, relative to that page's URL. */
export function nextPageUrl(linkHeader: string | null | undefined, pageUrl: string): string | undefined {
	const next = parseLinkHeader(linkHeader).get('next');
	if (!next) {
		return undefined;
	}
	return new URL(next, pageUrl).toString();
}
