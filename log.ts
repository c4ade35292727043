/**
 * Console-backed diagnostics.
 *
 * Messages carry a bracketed scope prefix (`[board] ...`) so they can be
 * filtered in devtools alongside the renderer's own output.
 */

export type LogLevel = 'silent' | 'warn' | 'debug' | 'trace';

export interface BoardLogger {
	warn(message: string): void;
	debug(message: string): void;
	trace(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
	silent: 0,
	warn: 1,
	debug: 2,
	trace: 3,
};

export interface ConsoleLoggerOptions {
	/** Scope shown in brackets before each message (default: 'board') */
	scope?: string;
	/** Most verbose level that is printed (default: 'warn') */
	level?: LogLevel;
	/** Sink, mostly for tests (default: globalThis.console) */
	sink?: Pick<Console, 'warn' | 'debug'>;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): BoardLogger {
	const { scope = 'board', level = 'warn', sink = console } = options;
	const rank = LEVEL_RANK[level];
	const prefix = `[${scope}]`;

	return {
		warn(message: string): void {
			if (rank >= LEVEL_RANK.warn) sink.warn(`${prefix} ${message}`);
		},
		debug(message: string): void {
			if (rank >= LEVEL_RANK.debug) sink.debug(`${prefix} ${message}`);
		},
		trace(message: string): void {
			if (rank >= LEVEL_RANK.trace) sink.debug(`${prefix} ${message}`);
		},
	};
}

export const silentLogger: BoardLogger = {
	warn() {},
	debug() {},
	trace() {},
};
