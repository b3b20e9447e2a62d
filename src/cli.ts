/**
 * @title CLI
 * @description Command tree for validating audiobook manifests and catalog feeds.
 *
 * @module cli
 */

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { isShelfcheckError, RuleCrashError, type SourceKind } from "@shelfcheck/core";
import { CLI_NAME, EXIT_CODES, type ExitCode } from "./constants.js";
import { LOG_LEVELS, logMessage } from "./utils/log.js";
import { runValidation, type CommandIO, type ValidateCommandOptions } from "./commands/validate.js";

/**
 * Default IO bound to the running process.
 */
export const processIO: CommandIO = {
	cwd: process.cwd(),
	env: process.env,
	stdout: (text) => process.stdout.write(text),
	stderr: (text) => process.stderr.write(text),
};

function parseTolerance(value: string): number {
	const tolerance = Number(value);
	if (value.trim() === "" || !Number.isFinite(tolerance) || tolerance < 0) {
		throw new InvalidArgumentError("Expected a non-negative number of seconds.");
	}
	return tolerance;
}

function collect(value: string, previous: string[] | undefined): string[] {
	return [...(previous ?? []), value];
}

function addValidationCommand(
	program: Command,
	kind: SourceKind,
	description: string,
	onResult: (code: ExitCode) => void,
	io: CommandIO,
): void {
	program
		.command(`${kind} <files...>`)
		.description(description)
		.option("-c, --config <file>", "configuration file (default: .shelfcheck.yml)")
		.option("-i, --ignore <pattern>", "suppress findings by rule id, /path/glob or rule@/path/glob (repeatable)", collect)
		.option("-t, --tolerance <seconds>", "allowed difference between declared and summed durations", parseTolerance)
		.option("--allow-repeated-resources", "allow the reading order to list a resource more than once")
		.option("--fail-on-warnings", "exit with status 1 when any warning is reported")
		.option("--json", "print results as JSON")
		.option("-o, --output <file>", "write results to a file instead of stdout")
		.option("--no-color", "disable coloured output")
		.addOption(new Option("--log-level <level>", "diagnostic log level").choices(LOG_LEVELS))
		.action(async (files: string[], options: ValidateCommandOptions) => {
			onResult(await runValidation(kind, files, options, io));
		});
}

/**
 * Build the command-line program.
 *
 * @param io - Output streams and environment
 * @param onResult - Receives the exit code of the command that ran
 */
export function createProgram(io: CommandIO, onResult: (code: ExitCode) => void): Command {
	const program = new Command();

	program
		.name(CLI_NAME)
		.description("Validate audiobook manifests and OPDS catalog feeds")
		.version("0.1.0")
		.configureOutput({
			writeOut: (text) => io.stdout(text),
			writeErr: (text) => io.stderr(text),
		})
		.exitOverride();

	addValidationCommand(program, "manifest", "validate audiobook manifests (JSON)", onResult, io);
	addValidationCommand(program, "feed", "validate OPDS 2 (JSON) or OPDS 1 (Atom) catalog feeds", onResult, io);
	addValidationCommand(
		program,
		"publications",
		"validate JSON arrays of OPDS 2 publications, such as a feed's publications list",
		onResult,
		io,
	);

	return program;
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the executable and script
 * @param io - Output streams and environment
 * @returns Process exit code
 */
export async function run(argv: string[], io: CommandIO = processIO): Promise<number> {
	let exitCode: number = EXIT_CODES.ok;
	const program = createProgram(io, (code) => {
		exitCode = code;
	});

	try {
		await program.parseAsync(argv, { from: "user" });
	} catch (error) {
		return handleError(error, io);
	}
	return exitCode;
}

function handleError(error: unknown, io: CommandIO): number {
	if (error instanceof RuleCrashError) {
		logMessage(error.message, "error", { ruleId: error.ruleId });
		io.stderr(`${error.format()}\n`);
		return EXIT_CODES.ruleCrash;
	}
	if (isShelfcheckError(error)) {
		io.stderr(`${error.format()}\n`);
		return EXIT_CODES.unusable;
	}
	if (error instanceof CommanderError) {
		// Help and version exit with 0; usage errors were already printed.
		return error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.unusable;
	}
	throw error;
}

