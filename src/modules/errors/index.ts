export enum SyncErrorCode {
	CONFIG_MISSING = 'CONFIG_MISSING',
	CONFIG_INVALID = 'CONFIG_INVALID',
	ACCESS_DENIED = 'ACCESS_DENIED',
	FETCH_FAILED = 'FETCH_FAILED',
	CACHE_UNREADABLE = 'CACHE_UNREADABLE',
	FILE_WRITE_FAILED = 'FILE_WRITE_FAILED',
	UNKNOWN = 'UNKNOWN',
}

/**
 * Base class for everything the sync pipeline throws on purpose.
 * `context` names the component or resource the error came from.
 */
export class SyncError extends Error {
	public readonly code: SyncErrorCode;
	public readonly context: string;

	constructor(code: SyncErrorCode, context: string, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'SyncError';
		this.code = code;
		this.context = context;
		Object.setPrototypeOf(this, new.target.prototype);
	}

	/**
	 * Wrap an arbitrary thrown value into a SyncError, keeping the original as `cause`.
	 * SyncErrors pass through unchanged.
	 */
	static wrap(error: unknown, code: SyncErrorCode, context: string, message: string): SyncError {
		if (error instanceof SyncError) {
			return error;
		}
		const originalMsg = error instanceof Error ? error.message : String(error);
		return new SyncError(code, context, `${message}: ${originalMsg}`, { cause: error });
	}
}

export class ConfigError extends SyncError {
	constructor(message: string, code: SyncErrorCode = SyncErrorCode.CONFIG_INVALID) {
		super(code, 'config', message);
		this.name = 'ConfigError';
	}
}

/** The API answered 403 for a library the token cannot read. */
export class AccessDeniedError extends SyncError {
	public readonly url: string;

	constructor(url: string) {
		super(SyncErrorCode.ACCESS_DENIED, url, `Access denied for ${url}`);
		this.name = 'AccessDeniedError';
		this.url = url;
	}
}

export class FetchError extends SyncError {
	public readonly url: string;
	public readonly attempts: number;
	public readonly status?: number;

	constructor(
		url: string,
		message: string,
		details: { attempts?: number; status?: number; cause?: unknown } = {}
	) {
		super(SyncErrorCode.FETCH_FAILED, url, message, { cause: details.cause });
		this.name = 'FetchError';
		this.url = url;
		this.attempts = details.attempts ?? 0;
		this.status = details.status;
	}
}

export class CacheReadError extends SyncError {
	constructor(path: string, message: string, cause?: unknown) {
		super(SyncErrorCode.CACHE_UNREADABLE, path, message, { cause });
		this.name = 'CacheReadError';
	}
}
