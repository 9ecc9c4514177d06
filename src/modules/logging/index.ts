export const LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type Level = (typeof LEVELS)[number];

const levelToEmoji: Record<Level, string> = {
	debug: '🐞',
	info: 'ℹ️',
	warn: '⚠️',
	error: '❌',
};

export interface Logger {
	debug(message: string, ...params: unknown[]): void;
	info(message: string, ...params: unknown[]): void;
	warn(message: string, ...params: unknown[]): void;
	error(message: string, ...params: unknown[]): void;
}

/** Where formatted lines end up. Defaults to the console. */
export type LogSink = (level: Level, line: string, params: unknown[]) => void;

const consoleSink: LogSink = (level, line, params) => {
	switch (level) {
		case 'debug':
			console.log(line, ...params);
			break;
		case 'info':
			console.info(line, ...params);
			break;
		case 'warn':
			console.warn(line, ...params);
			break;
		default:
			console.error(line, ...params);
			break;
	}
};

export function formatLine(level: Level, message: string, now: Date = new Date()): string {
	return `${now.toISOString()} ${levelToEmoji[level]} [${level.toUpperCase()}] ${message}`;
}

/**
 * Create a leveled logger. Messages below `threshold` are dropped.
 * Errors passed as params are printed with their stack.
 */
export function createLogger(threshold: Level = 'info', sink: LogSink = consoleSink): Logger {
	const emit = (level: Level, message: string, params: unknown[]) => {
		if (LEVELS.indexOf(level) < LEVELS.indexOf(threshold)) {
			return;
		}
		const printable = params.map((p) => (p instanceof Error && p.stack ? p.stack : p));
		sink(level, formatLine(level, message), printable);
	};
	return {
		debug: (message, ...params) => emit('debug', message, params),
		info: (message, ...params) => emit('info', message, params),
		warn: (message, ...params) => emit('warn', message, params),
		error: (message, ...params) => emit('error', message, params),
	};
}

/** Logger that discards everything; handy in tests. */
export const silentLogger: Logger = createLogger('error', () => undefined);
