/**
 * @title Suppression
 * @description Ignore patterns that drop matching findings from a report.
 *
 * Pattern forms:
 * - `rule-id` ignores every finding of that rule;
 * - `/path/glob` ignores findings whose path matches the glob;
 * - `rule-id@/path/glob` ignores findings of that rule under the glob.
 *
 * Globs use minimatch against the JSON Pointer path: `*` matches one path
 * segment and `**` any number of them.
 *
 * @module validation
 */

import { minimatch } from "minimatch";
import type { Finding } from "./report.js";

/**
 * A parsed ignore pattern.
 */
export interface IgnorePattern {
	/** Pattern as written. */
	readonly source: string;
	readonly ruleId?: string;
	readonly pathGlob?: string;
}

/**
 * Decides whether a finding is suppressed.
 */
export type Suppressor = (finding: Finding) => boolean;

/**
 * Parse one ignore pattern.
 *
 * @param pattern - Pattern as written in config or on the command line
 * @returns Parsed pattern, or undefined for a blank pattern
 */
export function parseIgnorePattern(pattern: string): IgnorePattern | undefined {
	const source = pattern.trim();
	if (source === "") {
		return undefined;
	}
	if (source.startsWith("/")) {
		return Object.freeze({ source, pathGlob: source });
	}
	const at = source.indexOf("@/");
	if (at === -1) {
		return Object.freeze({ source, ruleId: source });
	}
	return Object.freeze({ source, ruleId: source.slice(0, at), pathGlob: source.slice(at + 1) });
}

/**
 * Check whether a finding matches a parsed pattern.
 */
export function matchesIgnorePattern(pattern: IgnorePattern, finding: Finding): boolean {
	if (pattern.ruleId !== undefined && pattern.ruleId !== finding.ruleId) {
		return false;
	}
	if (pattern.pathGlob !== undefined && !minimatch(finding.path, pattern.pathGlob, { dot: true })) {
		return false;
	}
	return true;
}

/**
 * Build a suppressor from ignore patterns. Blank patterns are skipped.
 */
export function createSuppressor(patterns: readonly string[]): Suppressor {
	const parsed = patterns.flatMap((pattern) => parseIgnorePattern(pattern) ?? []);
	if (parsed.length === 0) {
		return () => false;
	}
	return (finding) => parsed.some((pattern) => matchesIgnorePattern(pattern, finding));
}
