/**
 * @title Manifest Rules
 * @description Audiobook manifest checks, plus the metadata checks that
 * manifests share with feeds.
 *
 * @module validation
 */

import { AUDIOBOOK_PROFILE, AUDIOBOOK_TYPE } from "../../types/manifest.js";
import { localizedValues, type AnyLinkNode, type LocalizedString } from "../../types/nodes.js";
import { formatPath } from "../../types/path.js";
import { isInternalHref, normaliseHref } from "../document-index.js";
import { hasTopLevelType, isMediaType, KNOWN_AUDIO_TYPES, mediaTypeEssence } from "../media-types.js";
import { defineRule } from "../rule.js";

const READING_PROGRESSIONS = ["ltr", "rtl", "ttb", "btt", "auto"];
const ABSOLUTE_URI = /^[A-Za-z][A-Za-z0-9+.-]*:[^\s]+$/;
const LANGUAGE_TAG = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{1,8})*$/;
const ISO_DATE = /^\d{4}(-\d{2}(-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?)?)?$/;
const MEDIA_FRAGMENT = /^t=(?:npt:)?(\d+(?:\.\d+)?)(?:,(\d+(?:\.\d+)?)?)?$/;

function isBlank(value: LocalizedString | undefined): boolean {
	return value === undefined || localizedValues(value).every((text) => text.trim() === "");
}

/**
 * Check whether a value is an ISO 8601 date or date-time.
 */
export function isIsoDate(value: string): boolean {
	return ISO_DATE.test(value) && !Number.isNaN(Date.parse(value));
}

/**
 * Check whether a value is an absolute URI (it has a scheme).
 */
export function isAbsoluteUri(value: string): boolean {
	return ABSOLUTE_URI.test(value);
}

/**
 * Start offset in seconds of a `#t=` media fragment.
 *
 * @returns The offset, null for a malformed `t=` fragment, or undefined
 * when the href has no temporal fragment
 */
export function temporalOffset(href: string): number | null | undefined {
	const hash = href.indexOf("#");
	if (hash === -1) {
		return undefined;
	}
	const fragment = href.slice(hash + 1);
	if (!fragment.startsWith("t=")) {
		return undefined;
	}
	const match = MEDIA_FRAGMENT.exec(fragment);
	return match ? Number(match[1]) : null;
}

function isAudioItem(type: string | undefined): boolean {
	return type === undefined || hasTopLevelType(type, "audio");
}

export const audiobookType = defineRule({
	id: "audiobook-type",
	severity: "warning",
	description: "The manifest declares itself an audiobook.",
	appliesTo: ["manifest-metadata"],
	*check(node) {
		if (node.type !== AUDIOBOOK_TYPE && !node.conformsTo.includes(AUDIOBOOK_PROFILE)) {
			yield {
				message: "Manifest is not declared as an audiobook",
				suggestion: `Set "@type" to "${AUDIOBOOK_TYPE}" or list "${AUDIOBOOK_PROFILE}" in "conformsTo"`,
			};
		}
	},
});

export const readingOrderTypeRequired = defineRule({
	id: "reading-order-type-required",
	severity: "error",
	description: "Every reading order item declares a media type.",
	appliesTo: ["reading-order-item"],
	*check(node) {
		if (node.type === undefined) {
			yield {
				message: "Reading order item has no media type",
				suggestion: 'Add a "type" such as "audio/mpeg"',
			};
		}
	},
});

export const audioMediaType = defineRule({
	id: "audio-media-type",
	severity: "error",
	description: "Reading order items are audio resources.",
	appliesTo: ["reading-order-item"],
	*check(node) {
		if (node.type !== undefined && isMediaType(node.type) && !hasTopLevelType(node.type, "audio")) {
			yield { message: `Reading order item has non-audio media type "${node.type}"` };
		}
	},
});

export const unknownAudioType = defineRule({
	id: "unknown-audio-type",
	severity: "warning",
	description: "Audio media types are ones players are known to support.",
	appliesTo: ["reading-order-item"],
	*check(node) {
		if (node.type === undefined || !isMediaType(node.type) || !hasTopLevelType(node.type, "audio")) {
			return;
		}
		const essence = mediaTypeEssence(node.type);
		if (!KNOWN_AUDIO_TYPES.has(essence)) {
			yield { message: `Unrecognised audio media type "${essence}"` };
		}
	},
});

export const danglingReference = defineRule({
	id: "dangling-reference",
	severity: "error",
	description: "Internal hrefs resolve to a declared resource or reading order item.",
	appliesTo: ["reading-order-item", "toc-entry"],
	*check(node, { index }) {
		if (node.href === undefined || node.isAlternate || !isInternalHref(node.href)) {
			return;
		}
		const key = normaliseHref(node.href);
		// A bare fragment refers to the manifest itself.
		if (key === "") {
			return;
		}
		if (node.nodeType === "reading-order-item") {
			if (index.declaresResources && !index.resourcesByHref.has(key)) {
				yield {
					message: `"${node.href}" is not declared in resources`,
					suggestion: "Add a matching entry to resources or fix the href",
				};
			}
		} else if (!index.readingOrderByHref.has(key)) {
			yield { message: `"${node.href}" does not point at a reading order item` };
		}
	},
});

export const duplicateResource = defineRule({
	id: "duplicate-resource",
	severity: "error",
	description: "Each internal resource is declared once.",
	appliesTo: ["resource"],
	*check(node, { index }) {
		if (node.href === undefined || !isInternalHref(node.href)) {
			return;
		}
		const declared = index.resourcesByHref.get(normaliseHref(node.href)) ?? [];
		if (declared.indexOf(node) > 0) {
			yield { message: `Resource "${node.href}" is already declared at ${formatPath(declared[0].path)}` };
		}
	},
});

export const duplicateReadingOrder = defineRule({
	id: "duplicate-reading-order",
	severity: "error",
	description: "The reading order lists each resource once unless repeats are allowed.",
	appliesTo: ["reading-order-item"],
	*check(node, { index, options }) {
		if (options.allowRepeatedResources || node.href === undefined) {
			return;
		}
		const items = index.readingOrderByHref.get(normaliseHref(node.href)) ?? [];
		if (items.indexOf(node) > 0) {
			yield {
				message: `Reading order repeats "${normaliseHref(node.href)}", first used at ${formatPath(items[0].path)}`,
				suggestion: "Remove the repeated item, or allow repeated resources if the repeat is intended",
			};
		}
	},
});

export const negativeDuration = defineRule({
	id: "negative-duration",
	severity: "error",
	description: "Declared durations are not negative.",
	appliesTo: ["reading-order-item", "resource", "manifest-metadata"],
	*check(node) {
		if (node.duration !== undefined && node.duration < 0) {
			yield { message: `Duration must not be negative, got ${node.duration}` };
		}
	},
});

export const missingDuration = defineRule({
	id: "missing-duration",
	severity: "warning",
	description: "Audio reading order items declare their duration.",
	appliesTo: ["reading-order-item"],
	*check(node) {
		if (node.duration === undefined && !node.isAlternate && isAudioItem(node.type)) {
			yield { message: "Reading order item has no duration" };
		}
	},
});

export const durationMismatch = defineRule({
	id: "duration-mismatch",
	severity: "warning",
	description: "The declared total duration matches the sum of the reading order.",
	appliesTo: ["manifest-metadata"],
	*check(node, { index, options }) {
		const { total, declared, items } = index.readingOrderDuration;
		if (node.duration === undefined || items === 0 || declared !== items) {
			return;
		}
		if (Math.abs(node.duration - total) > options.durationTolerance) {
			yield {
				message: `Declared duration ${node.duration}s differs from the reading order total ${total}s`,
				suggestion: "Some encoders round durations; update the declared total to match",
			};
		}
	},
});

export const tocMediaFragment = defineRule({
	id: "toc-media-fragment",
	severity: "error",
	description: "ToC media fragments carry a non-negative start offset.",
	appliesTo: ["toc-entry"],
	*check(node) {
		if (node.href !== undefined && temporalOffset(node.href) === null) {
			yield {
				message: `Malformed media fragment in "${node.href}"`,
				suggestion: 'Use "#t=<seconds>", for example "#t=90"',
			};
		}
	},
});

export const tocOffsetOutOfRange = defineRule({
	id: "toc-offset-out-of-range",
	severity: "error",
	description: "ToC offsets fall within the duration of their target.",
	appliesTo: ["toc-entry"],
	*check(node, { index }) {
		if (node.href === undefined) {
			return;
		}
		const offset = temporalOffset(node.href);
		if (offset === null || offset === undefined) {
			return;
		}
		const target = index.readingOrderByHref.get(normaliseHref(node.href))?.find((item) => item.duration !== undefined);
		const duration = target?.duration;
		if (duration !== undefined && offset > duration) {
			yield {
				message: `Offset ${offset}s is past the end of "${normaliseHref(node.href)}" (${duration}s)`,
			};
		}
	},
});

export const selfLink = defineRule({
	id: "self-link",
	severity: "warning",
	description: "A document links to its own canonical location.",
	appliesTo: ["manifest", "feed"],
	*check(node) {
		const links: readonly AnyLinkNode[] = node.links;
		if (!links.some((link) => link.rel.includes("self"))) {
			yield {
				message: "Document has no self link",
				suggestion: 'Add a link with rel "self" pointing at the canonical location of this document',
			};
		}
	},
});

export const titleRequired = defineRule({
	id: "title-required",
	severity: "error",
	description: "Metadata carries a non-empty title.",
	appliesTo: ["manifest-metadata", "feed-metadata", "publication-metadata"],
	*check(node) {
		if (isBlank(node.title)) {
			yield { message: "Metadata has no title" };
		}
	},
});

export const manifestIdentifierMissing = defineRule({
	id: "manifest-identifier-missing",
	severity: "warning",
	description: "A manifest declares an identifier.",
	appliesTo: ["manifest-metadata"],
	*check(node) {
		if (isBlank(node.identifier)) {
			yield {
				message: "Manifest declares no identifier",
				suggestion: 'Add an "identifier" such as "urn:isbn:..."',
			};
		}
	},
});

export const identifierUri = defineRule({
	id: "identifier-uri",
	severity: "error",
	description: "Identifiers are absolute URIs.",
	appliesTo: ["manifest-metadata", "publication-metadata"],
	*check(node) {
		if (node.identifier !== undefined && !isBlank(node.identifier) && !isAbsoluteUri(node.identifier)) {
			yield {
				message: `Identifier "${node.identifier}" is not an absolute URI`,
				suggestion: 'Use a URI such as "urn:isbn:9780000000000" or "urn:uuid:..."',
			};
		}
	},
});

export const languageCode = defineRule({
	id: "language-code",
	severity: "warning",
	description: "Languages are BCP 47 tags.",
	appliesTo: ["manifest-metadata", "publication-metadata"],
	*check(node) {
		for (const language of node.language) {
			if (!LANGUAGE_TAG.test(language)) {
				yield { message: `"${language}" is not a BCP 47 language tag` };
			}
		}
	},
});

export const invalidDate = defineRule({
	id: "invalid-date",
	severity: "error",
	description: "Dates are written in ISO 8601.",
	appliesTo: ["manifest-metadata", "feed-metadata", "publication-metadata"],
	*check(node) {
		const dates: [string, string | undefined][] = [["modified", node.modified]];
		if (node.nodeType !== "feed-metadata") {
			dates.push(["published", node.published]);
		}
		for (const [field, value] of dates) {
			if (value !== undefined && !isIsoDate(value)) {
				yield { message: `"${field}" is not an ISO 8601 date: "${value}"` };
			}
		}
	},
});

export const readingProgression = defineRule({
	id: "reading-progression",
	severity: "error",
	description: "The reading progression is one of the defined directions.",
	appliesTo: ["manifest-metadata"],
	*check(node) {
		if (node.readingProgression !== undefined && !READING_PROGRESSIONS.includes(node.readingProgression)) {
			yield {
				message: `Unknown reading progression "${node.readingProgression}"`,
				suggestion: `Use one of: ${READING_PROGRESSIONS.join(", ")}`,
			};
		}
	},
});

/** Rules for manifests and the metadata shared with feeds. */
export const manifestRules = [
	audiobookType,
	readingOrderTypeRequired,
	audioMediaType,
	unknownAudioType,
	danglingReference,
	duplicateResource,
	duplicateReadingOrder,
	negativeDuration,
	missingDuration,
	durationMismatch,
	tocMediaFragment,
	tocOffsetOutOfRange,
	selfLink,
	titleRequired,
	manifestIdentifierMissing,
	identifierUri,
	languageCode,
	invalidDate,
	readingProgression,
];
