/**
 * @title Batch Validation
 * @description Validate many documents in one call.
 *
 * Sources are loaded and validated by a small pool of workers. A document that
 * cannot be read or parsed becomes that source's outcome; the others carry
 * on. Rule crashes are not outcomes and reject the whole batch.
 *
 * @module validation
 */

import { DocumentReadError, StructuralError } from "../errors.js";
import { loadDocument, type DocumentSource, type SourceKind } from "../filesystem/load.js";
import type { Document } from "../types/index.js";
import { validate, type ValidateOptions } from "./engine.js";
import type { ValidationReport } from "./report.js";

/**
 * Result of validating one source.
 */
export type DocumentOutcome =
	| { readonly source: DocumentSource; readonly report: ValidationReport }
	| { readonly source: DocumentSource; readonly error: StructuralError | DocumentReadError };

/**
 * Check whether an outcome carries a report.
 */
export function hasReport(
	outcome: DocumentOutcome,
): outcome is { readonly source: DocumentSource; readonly report: ValidationReport } {
	return "report" in outcome;
}

async function validateSource(
	source: DocumentSource,
	kind: SourceKind,
	options: ValidateOptions,
): Promise<DocumentOutcome> {
	let document: Document;
	try {
		document = await loadDocument(source, kind);
	} catch (error) {
		if (error instanceof StructuralError || error instanceof DocumentReadError) {
			return Object.freeze({ source, error });
		}
		throw error;
	}
	return Object.freeze({ source, report: validate(document, options) });
}

/** Documents loaded at once when no limit is given. */
export const DEFAULT_BATCH_CONCURRENCY = 16;

/**
 * Options for a batch run.
 */
export interface BatchOptions extends ValidateOptions {
	/** Most documents read and validated at the same time. */
	concurrency?: number;
}

/**
 * Load and validate several documents of one kind. At most `concurrency`
 * files are open at any moment.
 *
 * @param sources - File paths or document bytes
 * @param kind - Whether the sources are manifests, feeds or publication lists
 * @param options - Options applied to every document
 * @returns One outcome per source, in input order
 * @throws RuleCrashError if a rule throws on any document
 * @throws RangeError if the concurrency limit is not a positive integer
 */
export async function validateDocuments(
	sources: readonly DocumentSource[],
	kind: SourceKind,
	options: BatchOptions = {},
): Promise<DocumentOutcome[]> {
	const { concurrency = DEFAULT_BATCH_CONCURRENCY, ...validateOptions } = options;
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
	}

	const outcomes: DocumentOutcome[] = new Array(sources.length);
	let next = 0;
	const worker = async (): Promise<void> => {
		while (next < sources.length) {
			const i = next++;
			outcomes[i] = await validateSource(sources[i], kind, validateOptions);
		}
	};

	await Promise.all(Array.from({ length: Math.min(concurrency, sources.length) }, worker));
	return outcomes;
}
