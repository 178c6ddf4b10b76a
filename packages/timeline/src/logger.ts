/**
 * Tagged console logging: every line is prefixed with its scope, e.g.
 * `[Timeline] Assembled game 746123`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export function createLogger(scope: string, level: LogLevel = 'info', sink: LogSink = console): Logger {
	const prefix = `[${scope}]`;
	const enabled = (at: LogLevel) => SEVERITY[at] >= SEVERITY[level];

	return {
		debug(message, ...details) {
			if (enabled('debug')) sink.debug(`${prefix} ${message}`, ...details);
		},
		info(message, ...details) {
			if (enabled('info')) sink.log(`${prefix} ${message}`, ...details);
		},
		warn(message, ...details) {
			if (enabled('warn')) sink.warn(`${prefix} ${message}`, ...details);
		},
		error(message, ...details) {
			if (enabled('error')) sink.error(`${prefix} ${message}`, ...details);
		},
	};
}
