import type { RetryPolicy } from '../config';
import { AccessDeniedError, FetchError } from '../errors';
import type { Logger } from '../logging';
import type { HeaderLookup, PageResponse } from '../../types/types';
import { RetryExhaustedError, withRetry } from '../../utils/retry';
import { ZOTERO_API_VERSION } from '../../constants/constants';

export interface FetchInit {
	method: 'GET';
	headers: Record<string, string>;
	signal: AbortSignal;
}

export interface FetchResponseLike {
	status: number;
	ok: boolean;
	headers: HeaderLookup;
	text(): Promise<string>;
}

/** The slice of the platform `fetch` the client relies on. */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface ZoteroClientOptions {
	logger: Logger;
	retry: RetryPolicy;
	requestTimeoutMs: number;
	fetch?: FetchLike;
	sleep?: (ms: number) => Promise<void>;
}

class HttpStatusError extends Error {
	public readonly status: number;

	constructor(url: string, status: number) {
		super(`${url} returned HTTP ${status}`);
		this.name = 'HttpStatusError';
		this.status = status;
	}
}

/**
 * Thin GET client for the Zotero web API.
 *
 * Every request is retried on transport errors and non-2xx answers,
 * except 403, which is raised straight away as AccessDeniedError so the
 * caller can treat it as "this library is off limits".
 *
 * Each attempt runs under one `requestTimeoutMs` signal covering connect,
 * headers and the whole body. There are no separate per-phase limits, so a
 * slow connect and a large page that is still streaming both count against
 * the same budget.
 */
export class ZoteroClient {
	private readonly logger: Logger;
	private readonly retry: RetryPolicy;
	private readonly requestTimeoutMs: number;
	private readonly fetchImpl: FetchLike;
	private readonly sleep?: (ms: number) => Promise<void>;

	constructor(options: ZoteroClientOptions) {
		this.logger = options.logger;
		this.retry = options.retry;
		this.requestTimeoutMs = options.requestTimeoutMs;
		this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
		this.sleep = options.sleep;
	}

	async fetchPage(url: string, headers: Record<string, string>): Promise<PageResponse> {
		try {
			return await withRetry((attempt) => this.attempt(url, headers, attempt), {
				maxAttempts: this.retry.maxAttempts,
				baseDelayMs: this.retry.baseDelayMs,
				maxDelayMs: this.retry.maxDelayMs,
				sleep: this.sleep,
				shouldRetry: (error) => !(error instanceof AccessDeniedError),
				onRetry: (error, attempt, delayMs) => {
					const reason = error instanceof Error ? error.message : String(error);
					this.logger.warn(
						`Attempt ${attempt}/${this.retry.maxAttempts} for ${url} failed (${reason}), retrying in ${delayMs}ms`
					);
				},
			});
		} catch (error) {
			if (error instanceof RetryExhaustedError) {
				const cause = error.cause;
				throw new FetchError(url, `GET ${url} failed: ${error.message}`, {
					attempts: error.attempts,
					status: cause instanceof HttpStatusError ? cause.status : undefined,
					cause,
				});
			}
			throw error;
		}
	}

	private async attempt(
		url: string,
		headers: Record<string, string>,
		attempt: number
	): Promise<PageResponse> {
		const started = Date.now();
		const response = await this.fetchImpl(url, {
			method: 'GET',
			headers: { 'Zotero-API-Version': ZOTERO_API_VERSION, ...headers },
			signal: AbortSignal.timeout(this.requestTimeoutMs),
		});
		const body = await response.text();
		const elapsedMs = Date.now() - started;
		this.logger.info(`${url} returned ${response.status} after ${elapsedMs}ms`);
		this.logger.debug(`attempt ${attempt}, ${body.length} characters`);

		if (response.status === 403) {
			throw new AccessDeniedError(url);
		}
		if (!response.ok) {
			throw new HttpStatusError(url, response.status);
		}
		return { url, status: response.status, headers: response.headers, body, elapsedMs };
	}
}
