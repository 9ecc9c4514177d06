import { promises as fs } from 'fs';
import path from 'path';

/**
 * Write `content` to `filePath` so readers only ever see the old or the new file.
 * The data is flushed to disk before the rename, and the directory entry after it.
 * The temporary file is removed whenever any step fails.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
	const dir = path.dirname(filePath);
	await fs.mkdir(dir, { recursive: true });
	const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

	try {
		const handle = await fs.open(tmpPath, 'w');
		try {
			await handle.writeFile(content, 'utf8');
			await handle.sync();
		} finally {
			await handle.close();
		}
		await fs.rename(tmpPath, filePath);
	} catch (error) {
		await fs.rm(tmpPath, { force: true });
		throw error;
	}

	await syncDirectory(dir);
}

async function syncDirectory(dir: string): Promise<void> {
	const handle = await fs.open(dir, 'r');
	try {
		await handle.sync();
	} finally {
		await handle.close();
	}
}
