export interface RetryOptions {
	/** Total attempts, first one included. */
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	/** Return false to rethrow immediately without another attempt. */
	shouldRetry?: (error: unknown, attempt: number) => boolean;
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
	sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
	public readonly attempts: number;

	constructor(attempts: number, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Gave up after ${attempts} attempts: ${reason}`, { cause });
		this.name = 'RetryExhaustedError';
		this.attempts = attempts;
	}
}

export const sleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
	return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Run `task` until it resolves or the attempts run out.
 * The attempt number (starting at 1) is passed to the task.
 */
export async function withRetry<T>(
	task: (attempt: number) => Promise<T>,
	options: RetryOptions
): Promise<T> {
	const wait = options.sleep ?? sleep;
	const maxAttempts = Math.max(1, options.maxAttempts);

	for (let attempt = 1; ; attempt++) {
		try {
			return await task(attempt);
		} catch (error) {
			if (options.shouldRetry && !options.shouldRetry(error, attempt)) {
				throw error;
			}
			if (attempt >= maxAttempts) {
				throw new RetryExhaustedError(attempt, error);
			}
			const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
			options.onRetry?.(error, attempt, delayMs);
			if (delayMs > 0) {
				await wait(delayMs);
			}
		}
	}
}
