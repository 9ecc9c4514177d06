/** A remote bibliography collection to mirror into one local file. */
export interface Resource {
	/** First page of the BibLaTeX export. Identity of the resource. */
	url: string;
	headers: Record<string, string>;
	/** File name inside the bibliography directory, e.g. `zotero.bib`. */
	outputName: string;
	/** Human-readable name used in log lines. */
	label: string;
}

/** Case-insensitive header access, as `Headers#get` provides. */
export interface HeaderLookup {
	get(name: string): string | null;
}

export interface PageResponse {
	url: string;
	status: number;
	headers: HeaderLookup;
	body: string;
	elapsedMs: number;
}

export interface PaginatedBody {
	body: string;
	pages: number;
}

// One entry of GET /users/{id}/groups. The id shows up both at the top level and under `data`.
export interface ZoteroGroupListItem {
	id?: number | string;
	name?: string;
	data?: {
		id?: number | string;
		name?: string;
	};
}

export type SyncOutcome =
	| { status: 'updated'; resource: Resource; version: number; previousVersion: number; pages: number }
	| { status: 'unchanged'; resource: Resource; version: number }
	| { status: 'would-update'; resource: Resource; version: number; previousVersion: number }
	| { status: 'access-denied'; resource: Resource }
	| { status: 'failed'; resource: Resource | null; error: Error };

export type SyncStatus = SyncOutcome['status'];

export interface SyncSummary {
	outcomes: SyncOutcome[];
	counts: Record<SyncStatus, number>;
	/** True when at least one resource (or the groups listing) failed. */
	failed: boolean;
}
