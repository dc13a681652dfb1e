/**
 * Logger wrapper — structured logging backed by pino.
 *
 * The calculator core never logs. Sessions, examples and other callers at the
 * edge take a Logger so tests can capture output or silence it.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface LoggerConfig {
	readonly level: LogLevel;
	/** pino redact paths, censored as "[REDACTED]" */
	readonly redactPaths?: readonly string[];
	/** Defaults to stdout */
	readonly destination?: { write(msg: string): void };
	/** Replaces pino's default pid and hostname bindings */
	readonly base?: Record<string, unknown>;
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type LogMethod = "info" | "warn" | "error" | "debug";

// ── Factory ─────────────────────────────────────────────────────────

function forward(
	pinoLogger: pino.Logger,
	method: LogMethod,
	msgOrObj: string | Record<string, unknown>,
	msg?: string,
): void {
	if (typeof msgOrObj === "string") {
		pinoLogger[method](msgOrObj);
	} else {
		pinoLogger[method](msgOrObj, msg ?? "");
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ decimalOdds: "2.5" }, "evaluation rejected");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.base) {
		pinoOptions.base = config.base;
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
	return wrapPino(pino({ level: "silent" }));
}
