/**
 * @title Validation Report
 * @description Findings and the immutable report built from them.
 *
 * A report is a pure data carrier. Queries here only derive views of the
 * findings; no validation logic lives in this module.
 *
 * @module validation
 */

import { formatPath, isPathPrefix, type NodePath } from "../types/path.js";

/**
 * Severity of a finding. Errors make a document unusable by a conforming
 * reader; warnings flag best-practice deviations.
 */
export type Severity = "error" | "warning";

/**
 * A single rule violation, located by path.
 */
export interface Finding {
	readonly severity: Severity;
	/** Identifier of the rule that produced the finding. */
	readonly ruleId: string;
	/** JSON Pointer rendering of `nodePath`. */
	readonly path: string;
	readonly nodePath: NodePath;
	readonly message: string;
	readonly suggestion?: string;
}

/**
 * Counts derived from a report.
 */
export interface ReportSummary {
	readonly errors: number;
	readonly warnings: number;
	/** Findings removed by ignore patterns. */
	readonly suppressed: number;
}

/**
 * Complete outcome of one validation run.
 */
export interface ValidationReport {
	/** True when no finding has severity "error". */
	readonly valid: boolean;
	/** Findings in traversal order. */
	readonly findings: readonly Finding[];
	readonly summary: ReportSummary;
}

/**
 * Findings split by severity, each list keeping report order.
 */
export type FindingsBySeverity = Readonly<Record<Severity, readonly Finding[]>>;

const CONTROL_CHARACTERS = /[\p{Cc}\u2028\u2029]/gu;

/**
 * Replace control characters and line separators with spaces so a
 * finding always renders on one line.
 */
export function sanitiseText(text: string): string {
	return text.replace(CONTROL_CHARACTERS, " ");
}

/**
 * Create a frozen finding with a rendered path and sanitised text.
 */
export function createFinding(input: {
	severity: Severity;
	ruleId: string;
	nodePath: NodePath;
	message: string;
	suggestion?: string;
}): Finding {
	const finding: Finding = {
		severity: input.severity,
		ruleId: input.ruleId,
		path: formatPath(input.nodePath),
		nodePath: Object.freeze([...input.nodePath]),
		message: sanitiseText(input.message),
		...(input.suggestion !== undefined ? { suggestion: sanitiseText(input.suggestion) } : {}),
	};
	return Object.freeze(finding);
}

/**
 * Count findings per severity.
 */
export function countBySeverity(findings: readonly Finding[]): { errors: number; warnings: number } {
	let errors = 0;
	let warnings = 0;
	for (const finding of findings) {
		if (finding.severity === "error") {
			errors++;
		} else {
			warnings++;
		}
	}
	return { errors, warnings };
}

/**
 * Freeze findings into a report.
 *
 * @param findings - Findings in traversal order
 * @param suppressed - Number of findings removed by ignore patterns
 * @returns Immutable report
 */
export function createReport(findings: readonly Finding[], suppressed = 0): ValidationReport {
	const { errors, warnings } = countBySeverity(findings);
	return Object.freeze({
		valid: errors === 0,
		findings: Object.freeze([...findings]),
		summary: Object.freeze({ errors, warnings, suppressed }),
	});
}

/**
 * Group findings by severity for display.
 */
export function groupBySeverity(report: ValidationReport): FindingsBySeverity {
	return Object.freeze({
		error: Object.freeze(report.findings.filter((finding) => finding.severity === "error")),
		warning: Object.freeze(report.findings.filter((finding) => finding.severity === "warning")),
	});
}

/**
 * Findings located at `prefix` or anywhere beneath it.
 *
 * @param report - Report to query
 * @param prefix - JSON Pointer such as "/readingOrder", or a node path
 * @returns Matching findings in report order
 */
export function findingsUnderPath(report: ValidationReport, prefix: string | NodePath): Finding[] {
	if (typeof prefix !== "string") {
		return report.findings.filter((finding) => isPathPrefix(prefix, finding.nodePath));
	}
	if (prefix === "/" || prefix === "") {
		return [...report.findings];
	}
	const base = prefix.endsWith("/") ? prefix.slice(0, -1) : prefix;
	return report.findings.filter((finding) => finding.path === base || finding.path.startsWith(`${base}/`));
}

/**
 * Render one finding as a single line.
 */
export function formatFinding(finding: Finding): string {
	const prefix = finding.severity === "error" ? "[ERROR]" : "[WARN]";
	return `${prefix} ${finding.path} ${finding.ruleId}: ${finding.message}`;
}

/**
 * Render the count-based summary line.
 */
export function formatSummary(report: ValidationReport): string {
	const { errors, warnings, suppressed } = report.summary;
	const counts = `${errors} error(s), ${warnings} warning(s)${suppressed > 0 ? `, ${suppressed} suppressed` : ""}`;
	return `Result: ${report.valid ? "PASS" : "FAIL"} (${counts})`;
}

/**
 * Render a report as plain text: errors first, then warnings, then the
 * summary line.
 *
 * @param report - Report to render
 * @returns Multi-line listing
 */
export function formatReport(report: ValidationReport): string {
	const lines: string[] = [];
	const groups = groupBySeverity(report);

	for (const finding of [...groups.error, ...groups.warning]) {
		lines.push(formatFinding(finding));
		if (finding.suggestion) {
			lines.push(`        Suggestion: ${finding.suggestion}`);
		}
	}

	if (lines.length > 0) {
		lines.push("");
	}
	lines.push(formatSummary(report));
	return lines.join("\n");
}
