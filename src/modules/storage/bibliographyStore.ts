import path from 'path';

import { SyncError, SyncErrorCode } from '../errors';
import type { Logger } from '../logging';
import { writeFileAtomic } from './atomicWrite';

/** Content files (`*.bib`) inside the bibliography directory. */
export class BibliographyStore {
	constructor(
		private readonly dir: string,
		private readonly logger: Logger
	) {}

	contentPath(outputName: string): string {
		return path.join(this.dir, outputName);
	}

	async write(outputName: string, body: string): Promise<void> {
		const file = this.contentPath(outputName);
		try {
			await writeFileAtomic(file, body);
		} catch (error) {
			throw SyncError.wrap(error, SyncErrorCode.FILE_WRITE_FAILED, file, `Failed to write ${file}`);
		}
		this.logger.info(`${outputName} updated`);
	}
}
