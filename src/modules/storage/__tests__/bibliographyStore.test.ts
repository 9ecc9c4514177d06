import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';

import { makeTempDir } from '../../../__tests__/fakeZotero';
import { SyncError, SyncErrorCode } from '../../errors';
import { silentLogger } from '../../logging';
import { BibliographyStore } from '../bibliographyStore';

describe('BibliographyStore', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await makeTempDir();
	});

	afterEach(async () => {
		jest.restoreAllMocks();
		await fs.rm(dir, { recursive: true, force: true });
	});

	const realOpen = fs.open.bind(fs);

	/** Let `fs.open` go through, then tamper with the handle it returns. */
	function interceptOpen(tamper: (handle: FileHandle, openedPath: string) => void) {
		return jest.spyOn(fs, 'open').mockImplementation(async (...args) => {
			const handle = await realOpen(...args);
			tamper(handle, String(args[0]));
			return handle;
		});
	}

	const diskFull = () => Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });

	test('replaces the content file as a whole', async () => {
		const store = new BibliographyStore(dir, silentLogger);
		await store.write('zotero.bib', 'old content that is longer');
		await store.write('zotero.bib', 'new');

		expect(await fs.readFile(path.join(dir, 'zotero.bib'), 'utf8')).toBe('new');
		expect(await fs.readdir(dir)).toEqual(['zotero.bib']);
	});

	test('wraps file system failures', async () => {
		// A directory where the file should go makes the rename fail.
		await fs.mkdir(path.join(dir, 'zotero.bib'));
		const store = new BibliographyStore(dir, silentLogger);

		const error = await store.write('zotero.bib', 'x').catch((e: unknown) => e);

		expect(error).toBeInstanceOf(SyncError);
		if (!(error instanceof SyncError)) return;
		expect(error.code).toBe(SyncErrorCode.FILE_WRITE_FAILED);
		expect(error.message).toMatch(/^Failed to write .*zotero\.bib: /);
		expect(await fs.readdir(dir)).toEqual(['zotero.bib']);
	});

	test('removes the temporary file when writing the data fails', async () => {
		interceptOpen((handle) => {
			jest.spyOn(handle, 'writeFile').mockRejectedValue(diskFull());
		});
		const store = new BibliographyStore(dir, silentLogger);

		await expect(store.write('zotero.bib', 'x')).rejects.toThrow(/: ENOSPC: no space left on device$/);
		expect(await fs.readdir(dir)).toEqual([]);
	});

	test('removes the temporary file when flushing fails', async () => {
		await fs.writeFile(path.join(dir, 'zotero.bib'), 'old');
		interceptOpen((handle) => {
			jest.spyOn(handle, 'sync').mockRejectedValue(diskFull());
		});
		const store = new BibliographyStore(dir, silentLogger);

		await expect(store.write('zotero.bib', 'new')).rejects.toBeInstanceOf(SyncError);
		expect(await fs.readdir(dir)).toEqual(['zotero.bib']);
		expect(await fs.readFile(path.join(dir, 'zotero.bib'), 'utf8')).toBe('old');
	});

	test('flushes the directory after the rename', async () => {
		const events: string[] = [];
		const realRename = fs.rename.bind(fs);
		jest.spyOn(fs, 'rename').mockImplementation(async (...args) => {
			await realRename(...args);
			events.push('rename');
		});
		interceptOpen((handle, openedPath) => {
			if (openedPath !== dir) return;
			const realSync = handle.sync.bind(handle);
			jest.spyOn(handle, 'sync').mockImplementation(async () => {
				await realSync();
				events.push('sync directory');
			});
		});
		const store = new BibliographyStore(dir, silentLogger);

		await store.write('zotero.bib', 'content');

		expect(events).toEqual(['rename', 'sync directory']);
		expect(await fs.readFile(path.join(dir, 'zotero.bib'), 'utf8')).toBe('content');
	});
});
