/**
 * @title Document Discovery
 * @description Expand command-line file arguments into document paths.
 *
 * @module filesystem
 */

import { glob, hasMagic } from "glob";

/**
 * Options for document discovery.
 */
export interface DiscoveryOptions {
	/** Directory patterns are resolved against. Defaults to the process cwd. */
	cwd?: string;
	/** Patterns of files to leave out. */
	ignore?: string[];
}

/**
 * Outcome of expanding a list of patterns.
 */
export interface DiscoveryResult {
	/** Matched paths in argument order without duplicates. Glob matches are relative to `cwd`. */
	files: string[];
	/** Glob patterns that matched no file. */
	unmatched: string[];
}

/**
 * Expand file arguments. Plain paths are kept as given, so a missing file
 * surfaces as a read error when it is loaded; glob patterns expand to their
 * matches in sorted order.
 *
 * @param patterns - File paths or glob patterns
 * @param options - Discovery options
 * @returns Matched files and the patterns that matched nothing
 */
export async function findDocumentFiles(patterns: string[], options: DiscoveryOptions = {}): Promise<DiscoveryResult> {
	const { cwd = process.cwd(), ignore = [] } = options;
	const seen = new Set<string>();
	const files: string[] = [];
	const unmatched: string[] = [];

	const add = (file: string): void => {
		if (!seen.has(file)) {
			seen.add(file);
			files.push(file);
		}
	};

	for (const pattern of patterns) {
		if (!hasMagic(pattern)) {
			add(pattern);
			continue;
		}

		const matches = await glob(pattern, { cwd, nodir: true, ignore, posix: true });
		if (matches.length === 0) {
			unmatched.push(pattern);
			continue;
		}
		matches.sort().forEach(add);
	}

	return { files, unmatched };
}
