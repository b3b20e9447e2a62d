/**
 * @title Validation Engine
 * @description Walks a document and dispatches rules to every node.
 *
 * Validation is synchronous and pure: one pass builds the document index,
 * a second visits every node in document order and runs the rules
 * registered for its type. Every violation is reported; nothing stops the
 * walk except a rule that throws.
 *
 * @module validation
 */

import { RuleCrashError } from "../errors.js";
import type { Document, DocumentNode } from "../types/index.js";
import { buildDocumentIndex } from "./document-index.js";
import { createFinding, createReport, type Finding, type ValidationReport } from "./report.js";
import type { Rule, RuleContext, RuleSet, Violation } from "./rule.js";
import { defaultRuleSet } from "./rules/index.js";
import { createSuppressor } from "./suppress.js";
import { walkDocument } from "./traverse.js";

/** Default allowed difference, in seconds, between declared and summed durations. */
export const DEFAULT_DURATION_TOLERANCE = 0.5;

/**
 * Options for a validation run.
 */
export interface ValidateOptions {
	/** Rules to run. Defaults to the built-in catalog. */
	ruleSet?: RuleSet;
	/** Seconds of slack for the duration-sum check. */
	durationTolerance?: number;
	/** Accept a reading order that lists a resource more than once. */
	allowRepeatedResources?: boolean;
	/** Ignore patterns; matching findings are counted but not reported. */
	ignore?: readonly string[];
}

function runRule(rule: Rule, node: DocumentNode, context: RuleContext): Violation[] {
	try {
		return [...rule.check(node, context)];
	} catch (error) {
		throw new RuleCrashError(rule.id, node.path, { cause: error });
	}
}

/**
 * Validate a document.
 *
 * @param document - Parsed manifest or feed
 * @param options - Rule set, thresholds and ignore patterns
 * @returns Frozen report with every finding in traversal order
 * @throws RuleCrashError if a rule throws
 *
 * @example
 * ```typescript
 * const report = validate(await loadManifest("manifest.json"));
 * if (!report.valid) {
 *   console.log(formatReport(report));
 * }
 * ```
 */
export function validate(document: Document, options: ValidateOptions = {}): ValidationReport {
	const ruleSet = options.ruleSet ?? defaultRuleSet;
	const context: RuleContext = Object.freeze({
		document,
		index: buildDocumentIndex(document),
		options: Object.freeze({
			durationTolerance: options.durationTolerance ?? DEFAULT_DURATION_TOLERANCE,
			allowRepeatedResources: options.allowRepeatedResources ?? false,
		}),
	});
	const isSuppressed = createSuppressor(options.ignore ?? []);

	const findings: Finding[] = [];
	let suppressed = 0;

	for (const node of walkDocument(document)) {
		for (const rule of ruleSet.rulesFor(node.nodeType)) {
			for (const violation of runRule(rule, node, context)) {
				const finding = createFinding({
					severity: rule.severity,
					ruleId: rule.id,
					nodePath: violation.path ?? node.path,
					message: violation.message,
					suggestion: violation.suggestion,
				});
				if (isSuppressed(finding)) {
					suppressed++;
				} else {
					findings.push(finding);
				}
			}
		}
	}

	return createReport(findings, suppressed);
}
