import { ConfigError, SyncErrorCode } from '../../errors';
import { authHeaders, loadConfig } from '..';

const env = { ZOTERO_USER_ID: '12345', ZOTERO_BEARER_TOKEN: 'test-secret' };

describe('loadConfig', () => {
	test('fills defaults around the required credentials', () => {
		expect(loadConfig(env)).toEqual({
			userId: '12345',
			bearerToken: 'test-secret',
			apiBaseUrl: 'https://api.zotero.org',
			outputDir: 'bibliography',
			logLevel: 'info',
			requestTimeoutMs: 10_000,
			retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 5_000 },
			includeGroups: true,
			force: false,
			dryRun: false,
		});
	});

	test.each([
		[{ ZOTERO_BEARER_TOKEN: 'test-secret' }, 'ZOTERO_USER_ID not set'],
		[{ ZOTERO_USER_ID: '12345' }, 'ZOTERO_BEARER_TOKEN not set'],
		[{ ZOTERO_USER_ID: '  ', ZOTERO_BEARER_TOKEN: 'test-secret' }, 'ZOTERO_USER_ID not set'],
	])('missing credentials abort with ConfigError (%p)', (vars, message) => {
		let caught: unknown;
		try {
			loadConfig(vars);
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(ConfigError);
		if (!(caught instanceof ConfigError)) return;
		expect(caught.message).toBe(message);
		expect(caught.code).toBe(SyncErrorCode.CONFIG_MISSING);
	});

	test('reads optional settings from the environment', () => {
		const config = loadConfig({
			...env,
			ZOTERO_API_BASE_URL: 'https://zotero.example.test/',
			BIBLIOGRAPHY_DIR: 'refs',
			LOG_LEVEL: 'debug',
		});
		expect(config.apiBaseUrl).toBe('https://zotero.example.test');
		expect(config.outputDir).toBe('refs');
		expect(config.logLevel).toBe('debug');
	});

	test('command line values win over the environment', () => {
		const config = loadConfig(
			{ ...env, BIBLIOGRAPHY_DIR: 'refs', LOG_LEVEL: 'debug' },
			{ outputDir: 'out', logLevel: 'warn', includeGroups: false, force: true, dryRun: true }
		);
		expect(config).toMatchObject({
			outputDir: 'out',
			logLevel: 'warn',
			includeGroups: false,
			force: true,
			dryRun: true,
		});
	});

	test('rejects an unknown LOG_LEVEL', () => {
		expect(() => loadConfig({ ...env, LOG_LEVEL: 'loud' })).toThrow(ConfigError);
		expect(() => loadConfig({ ...env, LOG_LEVEL: 'loud' })).toThrow(/^Invalid environment: LOG_LEVEL: /);
	});

	test('rejects an unknown --log-level', () => {
		expect(() => loadConfig(env, { logLevel: 'trace' })).toThrow(
			'Unknown log level "trace", expected one of debug, info, warn, error'
		);
	});

	test('rejects a base URL that is not a URL', () => {
		expect(() => loadConfig({ ...env, ZOTERO_API_BASE_URL: 'api.zotero.org' })).toThrow(ConfigError);
	});
});

describe('authHeaders', () => {
	test('sends the token as a bearer credential', () => {
		expect(authHeaders({ bearerToken: 'test-secret' })).toEqual({ Authorization: 'Bearer test-secret' });
	});
});
