/**
 * Rendering of validation outcomes for the terminal and for --json.
 */

import * as fs from "node:fs/promises";
import { Chalk, type ChalkInstance } from "chalk";
import {
	formatPath,
	getErrorMessage,
	ShelfcheckError,
	formatSummary,
	groupBySeverity,
	hasReport,
	StructuralError,
	type DocumentOutcome,
	type DocumentSource,
	type Finding,
	type ReportSummary,
	type ValidationReport,
} from "@shelfcheck/core";

const SUGGESTION_INDENT = "        ";

/**
 * Results could not be written to the output file.
 */
export class OutputError extends ShelfcheckError {
	/** Path that could not be written. */
	readonly file: string;

	constructor(file: string, options?: { cause?: unknown }) {
		const detail = options?.cause === undefined ? "" : `: ${getErrorMessage(options.cause)}`;
		super(`Cannot write results to ${file}${detail}`, "WRITE_ERROR", {
			suggestion: "Check that the output directory exists and is writable",
			cause: options?.cause,
		});
		this.name = "OutputError";
		this.file = file;
	}
}

/**
 * JSON shape of one document's outcome.
 */
export type JsonOutcome =
	| {
			source: string;
			valid: boolean;
			summary: ReportSummary;
			findings: JsonFinding[];
	  }
	| {
			source: string;
			error: { code: string; message: string; path?: string };
	  };

interface JsonFinding {
	severity: Finding["severity"];
	ruleId: string;
	path: string;
	message: string;
	suggestion?: string;
}

/**
 * Colour support for the current stream; `false` disables colour outright.
 */
export function createChalk(color: boolean): ChalkInstance {
	return color ? new Chalk() : new Chalk({ level: 0 });
}

/**
 * Label for a document source.
 */
export function sourceLabel(source: DocumentSource): string {
	return typeof source === "string" ? source : `<${source.byteLength} bytes>`;
}

function renderFinding(finding: Finding, chalk: ChalkInstance): string[] {
	const tag = finding.severity === "error" ? chalk.red("[ERROR]") : chalk.yellow("[WARN]");
	const lines = [`${tag} ${finding.path} ${chalk.cyan(finding.ruleId)}: ${finding.message}`];
	if (finding.suggestion) {
		lines.push(chalk.dim(`${SUGGESTION_INDENT}Suggestion: ${finding.suggestion}`));
	}
	return lines;
}

function renderReport(report: ValidationReport, chalk: ChalkInstance): string[] {
	const groups = groupBySeverity(report);
	const lines = [...groups.error, ...groups.warning].flatMap((finding) => renderFinding(finding, chalk));
	if (lines.length > 0) {
		lines.push("");
	}
	const summary = formatSummary(report);
	lines.push(report.valid ? chalk.green(summary) : chalk.red(summary));
	return lines;
}

function renderError(error: Error, chalk: ChalkInstance): string[] {
	const line =
		error instanceof StructuralError
			? `${chalk.red("[ERROR]")} ${formatPath(error.path)} ${chalk.cyan("structural-error")}: ${error.reason}`
			: `${chalk.red("[ERROR]")} ${error.message}`;
	return [line];
}

/**
 * Render outcomes as text: each document's name, its findings with errors
 * first, then its summary line. Documents are separated by a blank line.
 *
 * @param outcomes - Outcomes in input order
 * @param chalk - Colour instance; a level 0 instance yields plain text
 * @returns Text ending in a newline
 */
export function renderText(outcomes: readonly DocumentOutcome[], chalk: ChalkInstance): string {
	const blocks = outcomes.map((outcome) => {
		const body = hasReport(outcome) ? renderReport(outcome.report, chalk) : renderError(outcome.error, chalk);
		return [chalk.bold(sourceLabel(outcome.source)), ...body].join("\n");
	});
	return `${blocks.join("\n\n")}\n`;
}

/**
 * Convert an outcome to its JSON shape.
 */
export function toJsonOutcome(outcome: DocumentOutcome): JsonOutcome {
	const source = sourceLabel(outcome.source);
	if (!hasReport(outcome)) {
		const { error } = outcome;
		return {
			source,
			error:
				error instanceof StructuralError
					? { code: error.code, message: error.reason, path: formatPath(error.path) }
					: { code: error.code, message: error.message },
		};
	}

	const { report } = outcome;
	return {
		source,
		valid: report.valid,
		summary: { ...report.summary },
		findings: report.findings.map((finding) => ({
			severity: finding.severity,
			ruleId: finding.ruleId,
			path: finding.path,
			message: finding.message,
			...(finding.suggestion !== undefined ? { suggestion: finding.suggestion } : {}),
		})),
	};
}

/**
 * Render outcomes as a pretty-printed JSON array.
 */
export function renderJson(outcomes: readonly DocumentOutcome[]): string {
	return `${JSON.stringify(outcomes.map(toJsonOutcome), null, 2)}\n`;
}

/**
 * Write rendered results to a file.
 *
 * @throws OutputError if the file cannot be written
 */
export async function writeOutput(file: string, text: string): Promise<void> {
	try {
		await fs.writeFile(file, text, "utf-8");
	} catch (error) {
		throw new OutputError(file, { cause: error });
	}
}
