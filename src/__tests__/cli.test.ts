import { promises as fs } from 'fs';
import path from 'path';

import { main } from '../cli';
import { captureSink, FakeZotero, groupsUrl, makeTempDir, userItemsUrl } from './fakeZotero';

const env = {
	ZOTERO_USER_ID: 'u1',
	ZOTERO_BEARER_TOKEN: 'test-secret',
	ZOTERO_API_BASE_URL: 'https://api.test',
};

describe('cli main', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await makeTempDir();
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	test('missing credentials stop the run before any request', async () => {
		const api = new FakeZotero();
		const { sink, lines } = captureSink();

		const code = await main({ argv: ['node', 'cli'], env: {}, fetch: api.fetch, sink });

		expect(code).toBe(1);
		expect(api.calls).toEqual([]);
		expect(lines).toHaveLength(1);
		expect(lines[0].level).toBe('error');
		expect(lines[0].line).toMatch(/\[ERROR\] ZOTERO_USER_ID not set$/);
	});

	test('a clean run exits with 0 and writes into --output-dir', async () => {
		const api = new FakeZotero()
			.on(userItemsUrl, { body: '@misc{m}', headers: { 'Last-Modified-Version': '4' } })
			.on(groupsUrl, { body: '[]' });
		const { sink } = captureSink();

		const code = await main({
			argv: ['node', 'cli', '--output-dir', dir],
			env,
			fetch: api.fetch,
			sink,
		});

		expect(code).toBe(0);
		expect(await fs.readFile(path.join(dir, 'zotero.bib'), 'utf8')).toBe('@misc{m}');
		expect(await fs.readFile(path.join(dir, 'zotero.bib-last-modified-version'), 'utf8')).toBe('4');
	});

	test('a failed library makes the exit code 1', async () => {
		const api = new FakeZotero().on(userItemsUrl, { status: 500 });
		const { sink } = captureSink();

		const code = await main({
			argv: ['node', 'cli', '-o', dir, '--no-groups'],
			env,
			fetch: api.fetch,
			sleep: async () => undefined,
			sink,
		});

		expect(code).toBe(1);
		expect(api.calls).toEqual([userItemsUrl, userItemsUrl, userItemsUrl]);
	});

	test('--list-libraries prints each library and its file', async () => {
		const api = new FakeZotero().on(groupsUrl, { body: '[{"id":77}]' });
		const { sink, lines } = captureSink();

		const code = await main({
			argv: ['node', 'cli', '--list-libraries', '--log-level', 'info'],
			env,
			fetch: api.fetch,
			sink,
		});

		expect(code).toBe(0);
		const listed = lines.filter((l) => / -> /.test(l.line)).map((l) => l.line.replace(/^.*\[INFO\] /, ''));
		expect(listed).toEqual(['user:u1 -> zotero.bib', 'group:77 -> 77.bib']);
	});
});
