/**
 * @title Errors
 * @description Error types for @shelfcheck/core.
 *
 * Structural errors, rule crashes and rule-set misconfiguration are kept as
 * distinct classes so callers never confuse them with validation findings.
 *
 * @module errors
 */

import { formatPath, type NodePath } from "./types/path.js";

/**
 * Options for constructing a ShelfcheckError.
 */
export interface ShelfcheckErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all shelfcheck errors.
 */
export class ShelfcheckError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: ShelfcheckErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "ShelfcheckError";
		this.code = code;
		this.suggestion = options?.suggestion;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Input cannot be turned into a document at all: bad syntax, a missing
 * required container or a value of the wrong primitive type.
 *
 * Always fatal to the validation of that one document.
 */
export class StructuralError extends ShelfcheckError {
	/** Location of the offending value, from the document root. */
	readonly path: NodePath;
	/** Why the value was rejected, without the path. */
	readonly reason: string;
	/** File path or label of the input, when known. */
	readonly source?: string;

	constructor(path: NodePath, reason: string, options?: { source?: string; cause?: unknown }) {
		super(`${reason} (at ${formatPath(path)})`, "STRUCTURAL_ERROR", {
			suggestion: options?.source ? `Check the document at: ${options.source}` : undefined,
			cause: options?.cause,
		});
		this.name = "StructuralError";
		this.path = path;
		this.reason = reason;
		this.source = options?.source;
	}

	/**
	 * Copy of this error attributed to a source file or label.
	 */
	withSource(source: string): StructuralError {
		return new StructuralError(this.path, this.reason, { source, cause: this.cause });
	}
}

/**
 * A document could not be read from disk.
 */
export class DocumentReadError extends ShelfcheckError {
	/** Path that failed to read. */
	readonly source: string;

	constructor(source: string, options?: { cause?: unknown }) {
		super(`Failed to read document: ${source}`, "READ_ERROR", {
			suggestion: "Check that the file exists and is readable",
			cause: options?.cause,
		});
		this.name = "DocumentReadError";
		this.source = source;
	}
}

/**
 * A rule threw while evaluating a node.
 *
 * This is a defect in the rule, never a finding about the document, and it
 * aborts the whole validation run.
 */
export class RuleCrashError extends ShelfcheckError {
	/** Identifier of the rule that threw. */
	readonly ruleId: string;
	/** Path of the node being evaluated. */
	readonly path: NodePath;

	constructor(ruleId: string, path: NodePath, options?: { cause?: unknown }) {
		const detail = options?.cause === undefined ? "" : `: ${getErrorMessage(options.cause)}`;
		super(`Rule "${ruleId}" crashed at ${formatPath(path)}${detail}`, "RULE_CRASH", { cause: options?.cause });
		this.name = "RuleCrashError";
		this.ruleId = ruleId;
		this.path = path;
	}
}

/**
 * A rule set was assembled from inconsistent rules.
 */
export class RuleSetError extends ShelfcheckError {
	constructor(message: string) {
		super(message, "RULE_SET_ERROR");
		this.name = "RuleSetError";
	}
}

/**
 * Check if an error is a ShelfcheckError.
 */
export function isShelfcheckError(error: unknown): error is ShelfcheckError {
	return error instanceof ShelfcheckError;
}

/**
 * Check if an error is a StructuralError.
 */
export function isStructuralError(error: unknown): error is StructuralError {
	return error instanceof StructuralError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a ShelfcheckError.
 */
export function wrapError(error: unknown, context?: string): ShelfcheckError {
	if (isShelfcheckError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new ShelfcheckError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
