import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
	/** pino level name; `"silent"` disables output */
	level?: string;
	/** Where log lines go; defaults to stdout */
	destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
	const loggerOptions = {
		level: options.level ?? "info",
		base: {
			service: "xlsx-lens",
		},
	};
	return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

let silent: Logger | undefined;

/** Shared no-op logger used when callers pass none. */
export function silentLogger(): Logger {
	silent ??= pino({ level: "silent" });
	return silent;
}
