/**
 * @shelfcheck/core - Validation engine for audiobook manifests and OPDS feeds.
 *
 * This library provides:
 * - Document model (manifests, OPDS 2 JSON feeds, OPDS 1 Atom feeds)
 * - Loaders for files and pre-fetched bytes
 * - Rule catalog and rule-set construction
 * - Traversal engine producing immutable reports
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	ShelfcheckError,
	StructuralError,
	DocumentReadError,
	RuleCrashError,
	RuleSetError,
	type ShelfcheckErrorOptions,
	isShelfcheckError,
	isStructuralError,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Filesystem exports
export * from "./filesystem/index.js";

// Validation exports
export * from "./validation/index.js";
