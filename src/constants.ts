/**
 * Command name shown in help and usage lines.
 */
export const CLI_NAME = "shelfcheck";

/**
 * Configuration file names looked up in the working directory, in order.
 */
export const CONFIG_FILENAMES = [".shelfcheck.yml", ".shelfcheck.yaml"] as const;

/**
 * Environment variable that sets the log level when no flag is given.
 */
export const LOG_LEVEL_ENV = "SHELFCHECK_LOG_LEVEL";

/**
 * Process exit codes.
 */
export const EXIT_CODES = {
	/** Every document validated without errors. */
	ok: 0,
	/** At least one report is invalid, or has warnings under --fail-on-warnings. */
	invalid: 1,
	/** A document, the configuration or the arguments could not be used. */
	unusable: 2,
	/** A rule threw while checking a document. */
	ruleCrash: 70,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
