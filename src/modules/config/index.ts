import { z } from 'zod';

import {
	DEFAULT_API_BASE_URL,
	DEFAULT_BIBLIOGRAPHY_DIR,
	DEFAULT_MAX_ATTEMPTS,
	DEFAULT_REQUEST_TIMEOUT_MS,
	DEFAULT_RETRY_BASE_DELAY_MS,
	DEFAULT_RETRY_MAX_DELAY_MS,
} from '../../constants/constants';
import { ConfigError, SyncErrorCode } from '../errors';
import { LEVELS, type Level } from '../logging';

const levelSchema = z.enum(LEVELS);

const envSchema = z.object({
	ZOTERO_USER_ID: z.string().trim().min(1).optional(),
	ZOTERO_BEARER_TOKEN: z.string().trim().min(1).optional(),
	ZOTERO_API_BASE_URL: z.string().url().optional(),
	BIBLIOGRAPHY_DIR: z.string().min(1).optional(),
	LOG_LEVEL: levelSchema.optional(),
});

export interface RetryPolicy {
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
}

export interface SyncConfig {
	userId: string;
	bearerToken: string;
	apiBaseUrl: string;
	outputDir: string;
	logLevel: Level;
	requestTimeoutMs: number;
	retry: RetryPolicy;
	includeGroups: boolean;
	force: boolean;
	dryRun: boolean;
}

/** Values given on the command line; they win over the environment. */
export interface ConfigOverrides {
	outputDir?: string;
	logLevel?: string;
	includeGroups?: boolean;
	force?: boolean;
	dryRun?: boolean;
}

/**
 * Build the run configuration from the environment and CLI overrides.
 * Throws ConfigError before anything touches the network.
 */
export function loadConfig(
	env: NodeJS.ProcessEnv = process.env,
	overrides: ConfigOverrides = {}
): SyncConfig {
	const parsed = envSchema.safeParse(pickEnv(env));
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ');
		throw new ConfigError(`Invalid environment: ${issues}`);
	}
	const vars = parsed.data;

	if (!vars.ZOTERO_USER_ID) {
		throw new ConfigError('ZOTERO_USER_ID not set', SyncErrorCode.CONFIG_MISSING);
	}
	if (!vars.ZOTERO_BEARER_TOKEN) {
		throw new ConfigError('ZOTERO_BEARER_TOKEN not set', SyncErrorCode.CONFIG_MISSING);
	}

	let logLevel: Level = vars.LOG_LEVEL ?? 'info';
	if (overrides.logLevel !== undefined) {
		const level = levelSchema.safeParse(overrides.logLevel);
		if (!level.success) {
			throw new ConfigError(
				`Unknown log level "${overrides.logLevel}", expected one of ${LEVELS.join(', ')}`
			);
		}
		logLevel = level.data;
	}

	return {
		userId: vars.ZOTERO_USER_ID,
		bearerToken: vars.ZOTERO_BEARER_TOKEN,
		apiBaseUrl: (vars.ZOTERO_API_BASE_URL ?? DEFAULT_API_BASE_URL).replace(/\/+$/, ''),
		outputDir: overrides.outputDir ?? vars.BIBLIOGRAPHY_DIR ?? DEFAULT_BIBLIOGRAPHY_DIR,
		logLevel,
		requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
		retry: {
			maxAttempts: DEFAULT_MAX_ATTEMPTS,
			baseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
			maxDelayMs: DEFAULT_RETRY_MAX_DELAY_MS,
		},
		includeGroups: overrides.includeGroups ?? true,
		force: overrides.force ?? false,
		dryRun: overrides.dryRun ?? false,
	};
}

// Empty strings count as unset, the way CI secrets show up when they are not defined.
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
	const keys = [
		'ZOTERO_USER_ID',
		'ZOTERO_BEARER_TOKEN',
		'ZOTERO_API_BASE_URL',
		'BIBLIOGRAPHY_DIR',
		'LOG_LEVEL',
	] as const;
	const picked: Record<string, string | undefined> = {};
	for (const key of keys) {
		const value = env[key];
		picked[key] = value === undefined || value.trim() === '' ? undefined : value;
	}
	return picked;
}

export function authHeaders(config: Pick<SyncConfig, 'bearerToken'>): Record<string, string> {
	return { Authorization: `Bearer ${config.bearerToken}` };
}
