/* eslint-disable no-console */

type Sink = typeof console.log;
type Level = "error" | "info" | "debug";

export interface Logger {
	info(...msg: unknown[]): void;
	error(...msg: unknown[]): void;
	debug(...msg: unknown[]): void;
}

function timeString(): string {
	return new Date().toISOString();
}
function dolog(sink: Sink, parts: unknown[]) {
	sink.apply(console, [timeString() as unknown].concat(parts));
}

export function createLogger(options: { debug?: boolean } = {}): Logger & { enableDebug: () => void } {
	let debugEnabled = options.debug ?? false;

	function log(level: Level, msg: unknown[]) {
		if (level == "error") return dolog(console.error, ["ERROR" as unknown].concat(msg));
		if (level == "info") return dolog(console.error, msg);
		if (level == "debug" && debugEnabled) return dolog(console.error, ["DEBUG" as unknown].concat(msg));
	}

	return {
		enableDebug: () => (debugEnabled = true),
		info: function (...msg: unknown[]) {
			log("info", msg);
		},
		error: function (...msg: unknown[]) {
			log("error", msg);
		},
		debug: function (...msg: unknown[]) {
			log("debug", msg);
		},
	};
}

/** Discards everything. Used where a caller passes no logger. */
export const silentLogger: Logger = {
	info: () => undefined,
	error: () => undefined,
	debug: () => undefined,
};

const logger = createLogger();

export default logger;
