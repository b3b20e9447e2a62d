/**
 * @title Validation Module
 * @description Rules, traversal engine and reports.
 *
 * @module validation
 */

export {
	type Severity,
	type Finding,
	type ReportSummary,
	type ValidationReport,
	type FindingsBySeverity,
	sanitiseText,
	createFinding,
	createReport,
	countBySeverity,
	groupBySeverity,
	findingsUnderPath,
	formatFinding,
	formatSummary,
	formatReport,
} from "./report.js";

export {
	type Violation,
	type RuleOptions,
	type RuleContext,
	type Rule,
	type RuleSet,
	defineRule,
	createRuleSet,
} from "./rule.js";

export {
	type DurationSummary,
	type DocumentIndex,
	buildDocumentIndex,
	isInternalHref,
	normaliseHref,
} from "./document-index.js";

export { walkDocument } from "./traverse.js";

export {
	OPDS1_FEED_TYPE,
	OPDS2_FEED_TYPE,
	KNOWN_AUDIO_TYPES,
	isMediaType,
	mediaTypeEssence,
	hasTopLevelType,
} from "./media-types.js";

export {
	defaultRules,
	defaultRuleSet,
	linkRules,
	manifestRules,
	feedRules,
	isAbsoluteUri,
	isIsoDate,
	temporalOffset,
	isAcquisitionLink,
	isUriReference,
} from "./rules/index.js";

export {
	type IgnorePattern,
	type Suppressor,
	parseIgnorePattern,
	matchesIgnorePattern,
	createSuppressor,
} from "./suppress.js";

export { DEFAULT_DURATION_TOLERANCE, type ValidateOptions, validate } from "./engine.js";

export {
	DEFAULT_BATCH_CONCURRENCY,
	type BatchOptions,
	type DocumentOutcome,
	hasReport,
	validateDocuments,
} from "./batch.js";
