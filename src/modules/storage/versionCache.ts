import { promises as fs } from 'fs';
import path from 'path';

import { VERSION_FILE_SUFFIX } from '../../constants/constants';
import { CacheReadError } from '../errors';
import type { Logger } from '../logging';
import { writeFileAtomic } from './atomicWrite';

/**
 * Sidecar files holding the last synced `last-modified-version` per output file.
 * `zotero.bib` keeps its marker in `zotero.bib-last-modified-version`.
 */
export class VersionCache {
	constructor(
		private readonly dir: string,
		private readonly logger: Logger
	) {}

	markerPath(outputName: string): string {
		return path.join(this.dir, `${outputName}${VERSION_FILE_SUFFIX}`);
	}

	/** Last persisted version, or 0 when the marker is missing or unreadable. */
	async read(outputName: string): Promise<number> {
		const file = this.markerPath(outputName);
		try {
			const version = parseVersion(await readMarker(file), file);
			this.logger.info(`last-modified-version is ${version}`);
			return version;
		} catch (error) {
			if (error instanceof CacheReadError) {
				this.logger.debug(`${error.message}, treating cached version as 0`);
				return 0;
			}
			throw error;
		}
	}

	async write(outputName: string, version: number): Promise<void> {
		await writeFileAtomic(this.markerPath(outputName), String(version));
		this.logger.info(`last-modified-version updated to ${version}`);
	}
}

async function readMarker(file: string): Promise<string> {
	try {
		return await fs.readFile(file, 'utf8');
	} catch (error) {
		throw new CacheReadError(file, `Cannot read ${file}`, error);
	}
}

/** First line of the marker, as a non-negative integer. */
export function parseVersion(text: string, source = 'version marker'): number {
	const firstLine = text.split(/\r?\n/, 1)[0].trim();
	if (!/^\d+$/.test(firstLine)) {
		throw new CacheReadError(source, `${source} does not hold an integer`);
	}
	return Number.parseInt(firstLine, 10);
}
