/**
 * The `manifest` and `feed` commands: discover, load, validate, render.
 */

import * as path from "node:path";
import {
	DEFAULT_DURATION_TOLERANCE,
	findDocumentFiles,
	hasReport,
	validateDocuments,
	type DocumentOutcome,
	type SourceKind,
} from "@shelfcheck/core";
import { EXIT_CODES, LOG_LEVEL_ENV, type ExitCode } from "../constants.js";
import { loadConfig, type ShelfcheckConfig } from "../utils/config.js";
import { DEFAULT_LOG_LEVEL, isLogLevel, logMessage, setLogLevel, type LogLevel } from "../utils/log.js";
import { createChalk, renderJson, renderText, writeOutput } from "../utils/output.js";

/**
 * Options shared by both validation commands, as parsed from the command line.
 */
export interface ValidateCommandOptions {
	config?: string;
	ignore?: string[];
	tolerance?: number;
	allowRepeatedResources?: boolean;
	failOnWarnings?: boolean;
	json?: boolean;
	output?: string;
	color?: boolean;
	logLevel?: LogLevel;
}

/**
 * Where the command writes. Injected so tests can capture output.
 */
export interface CommandIO {
	cwd: string;
	env: Readonly<Record<string, string | undefined>>;
	stdout(text: string): void;
	stderr(text: string): void;
}

/**
 * Settings after merging the config file with command-line options.
 */
export interface ResolvedSettings {
	ignore: string[];
	durationTolerance: number;
	allowRepeatedResources: boolean;
	failOnWarnings: boolean;
	logLevel: LogLevel;
}

/**
 * Merge settings. Flags win over the environment, which wins over the file;
 * ignore patterns from both sources apply.
 */
export function resolveSettings(
	config: ShelfcheckConfig,
	options: ValidateCommandOptions,
	env: Readonly<Record<string, string | undefined>>,
): ResolvedSettings {
	const envLevel = env[LOG_LEVEL_ENV];
	return {
		ignore: [...config.ignore, ...(options.ignore ?? [])],
		durationTolerance: options.tolerance ?? config.durationTolerance ?? DEFAULT_DURATION_TOLERANCE,
		allowRepeatedResources: options.allowRepeatedResources === true || config.allowRepeatedResources,
		failOnWarnings: options.failOnWarnings === true || config.failOnWarnings,
		logLevel:
			options.logLevel ??
			(envLevel !== undefined && isLogLevel(envLevel) ? envLevel : undefined) ??
			config.logLevel ??
			DEFAULT_LOG_LEVEL,
	};
}

/**
 * Exit code for a batch of outcomes.
 */
export function exitCodeFor(outcomes: readonly DocumentOutcome[], failOnWarnings: boolean): ExitCode {
	if (outcomes.some((outcome) => !hasReport(outcome))) {
		return EXIT_CODES.unusable;
	}
	const failed = outcomes.some(
		(outcome) =>
			hasReport(outcome) && (!outcome.report.valid || (failOnWarnings && outcome.report.summary.warnings > 0)),
	);
	return failed ? EXIT_CODES.invalid : EXIT_CODES.ok;
}

/**
 * Validate the documents named by `patterns` and write the result.
 *
 * @param kind - Whether the files are manifests, feeds or publication lists
 * @param patterns - File paths or glob patterns
 * @param options - Parsed command-line options
 * @param io - Output streams and environment
 * @returns Process exit code
 * @throws ConfigError if the configuration file is invalid
 * @throws OutputError if the results cannot be written to `options.output`
 * @throws RuleCrashError if a rule throws
 */
export async function runValidation(
	kind: SourceKind,
	patterns: string[],
	options: ValidateCommandOptions,
	io: CommandIO,
): Promise<ExitCode> {
	const { config, file: configFile } = await loadConfig(options.config, io.cwd);
	const settings = resolveSettings(config, options, io.env);
	setLogLevel(settings.logLevel);
	if (configFile) {
		logMessage(`Using configuration from ${configFile}`, "debug");
	}

	const { files, unmatched } = await findDocumentFiles(patterns, { cwd: io.cwd });
	for (const pattern of unmatched) {
		logMessage(`No files match "${pattern}"`, "warn", { pattern });
	}
	if (files.length === 0) {
		io.stderr("No documents to validate.\n");
		return EXIT_CODES.unusable;
	}

	logMessage(`Validating ${files.length} ${kind} document(s)`, "info", { kind, count: files.length });
	const outcomes = await validateDocuments(
		files.map((file) => path.resolve(io.cwd, file)),
		kind,
		{
			durationTolerance: settings.durationTolerance,
			allowRepeatedResources: settings.allowRepeatedResources,
			ignore: settings.ignore,
		},
	);
	// Report paths as the user wrote them.
	const labelled = outcomes.map((outcome, i) => ({ ...outcome, source: files[i] }));

	for (const outcome of labelled) {
		if (hasReport(outcome)) {
			logMessage(`Validated ${outcome.source}`, "debug", { ...outcome.report.summary, source: outcome.source });
		}
	}

	// Files never get colour codes.
	const color = options.output === undefined && options.color !== false;
	const rendered = options.json ? renderJson(labelled) : renderText(labelled, createChalk(color));
	if (options.output) {
		const target = path.resolve(io.cwd, options.output);
		await writeOutput(target, rendered);
		logMessage(`Wrote results to ${target}`, "info");
	} else {
		io.stdout(rendered);
	}

	return exitCodeFor(labelled, settings.failOnWarnings);
}
