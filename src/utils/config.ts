/**
 * CLI configuration file handling.
 *
 * The file is YAML; unknown keys are rejected so a typo cannot silently
 * switch a check off.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { getErrorMessage, ShelfcheckError } from "@shelfcheck/core";
import { CONFIG_FILENAMES } from "../constants.js";
import { LOG_LEVELS } from "./log.js";

/**
 * The configuration file is missing, unreadable or invalid.
 */
export class ConfigError extends ShelfcheckError {
	/** Path of the offending file. */
	readonly file: string;

	constructor(file: string, message: string, options?: { cause?: unknown }) {
		super(message, "CONFIG_ERROR", {
			suggestion: `Check the configuration file at: ${file}`,
			cause: options?.cause,
		});
		this.name = "ConfigError";
		this.file = file;
	}
}

export const configSchema = z
	.object({
		ignore: z.array(z.string()).default([]),
		durationTolerance: z.number().nonnegative().optional(),
		allowRepeatedResources: z.boolean().default(false),
		failOnWarnings: z.boolean().default(false),
		logLevel: z.enum(LOG_LEVELS).optional(),
	})
	.strict();

/**
 * Parsed configuration with defaults applied.
 */
export type ShelfcheckConfig = z.infer<typeof configSchema>;

/** Configuration used when no file is found. */
export const DEFAULT_CONFIG: ShelfcheckConfig = Object.freeze({
	ignore: [],
	allowRepeatedResources: false,
	failOnWarnings: false,
});

function formatIssue(issue: z.ZodIssue): string {
	const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
	return `${field}: ${issue.message}`;
}

/**
 * Parse configuration file content.
 *
 * @param content - YAML text
 * @param file - Path reported in errors
 * @returns Validated configuration; an empty file yields the defaults
 * @throws ConfigError on YAML syntax errors or invalid values
 */
export function parseConfigContent(content: string, file: string): ShelfcheckConfig {
	let raw: unknown;
	try {
		raw = yaml.load(content, { filename: file });
	} catch (error) {
		throw new ConfigError(file, `Invalid YAML in ${file}: ${getErrorMessage(error)}`, { cause: error });
	}

	const result = configSchema.safeParse(raw ?? {});
	if (!result.success) {
		const issues = result.error.issues.map(formatIssue).join("; ");
		throw new ConfigError(file, `Invalid configuration in ${file}: ${issues}`, { cause: result.error });
	}
	return result.data;
}

async function exists(file: string): Promise<boolean> {
	try {
		await fs.access(file);
		return true;
	} catch {
		return false;
	}
}

/**
 * Find the configuration file in a directory.
 *
 * @returns Absolute path, or undefined when there is none
 */
export async function findConfigFile(directory: string): Promise<string | undefined> {
	for (const filename of CONFIG_FILENAMES) {
		const candidate = path.resolve(directory, filename);
		if (await exists(candidate)) {
			return candidate;
		}
	}
	return undefined;
}

/**
 * Load the configuration. An explicit file must exist; otherwise the
 * working directory is searched and the defaults apply when nothing is found.
 *
 * @param explicitFile - Path given with --config
 * @param cwd - Directory searched for a configuration file
 * @returns The configuration and the file it came from
 */
export async function loadConfig(
	explicitFile: string | undefined,
	cwd: string,
): Promise<{ config: ShelfcheckConfig; file?: string }> {
	const file = explicitFile !== undefined ? path.resolve(cwd, explicitFile) : await findConfigFile(cwd);
	if (file === undefined) {
		return { config: DEFAULT_CONFIG };
	}

	let content: string;
	try {
		content = await fs.readFile(file, "utf-8");
	} catch (error) {
		throw new ConfigError(file, `Cannot read configuration file ${file}: ${getErrorMessage(error)}`, {
			cause: error,
		});
	}
	return { config: parseConfigContent(content, file), file };
}
