import pino, { type DestinationStream, type Logger } from "pino";

/**
 * Log levels from least to most verbose.
 */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Level used when neither a flag, the environment nor the config sets one. */
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

let logger: Logger | undefined;

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Replace the CLI logger. Logs go to stderr unless a destination is given,
 * so stdout carries nothing but the report.
 *
 * @param level - Most verbose level to emit
 * @param destination - Stream receiving one JSON line per message
 */
export function configureLogger(level: LogLevel, destination?: DestinationStream): Logger {
	logger = pino(
		{ name: "shelfcheck", level, base: null },
		destination ?? pino.destination({ dest: 2, sync: true }),
	);
	return logger;
}

/**
 * The current logger, created at the default level on first use.
 */
export function getLogger(): Logger {
	return logger ?? configureLogger(DEFAULT_LOG_LEVEL);
}

/**
 * Change the level of the current logger.
 */
export function setLogLevel(level: LogLevel): void {
	getLogger().level = level;
}

/**
 * Logs a message if its type is at or below the configured level.
 *
 * @param message - The message to log.
 * @param type - The type of log message.
 * @param fields - Structured context merged into the log line.
 */
export function logMessage(message: string, type: LogLevel = "info", fields: Record<string, unknown> = {}): void {
	getLogger()[type](fields, message);
}
