/**
 * @title Feed Rules
 * @description OPDS catalog checks.
 *
 * @module validation
 */

import type { AnyLinkNode } from "../../types/nodes.js";
import { childPath, formatPath } from "../../types/path.js";
import type { DocumentIndex } from "../document-index.js";
import { hasTopLevelType, isMediaType, mediaTypeEssence, OPDS1_FEED_TYPE, OPDS2_FEED_TYPE } from "../media-types.js";
import { defineRule } from "../rule.js";

const ACQUISITION_REL_PREFIX = "http://opds-spec.org/acquisition";
const BORROW_REL = "http://opds-spec.org/acquisition/borrow";
const TEMPLATE_EXPRESSION = /\{[^{}]*\}/g;
const URI_REFERENCE = /^(?:[\w\-.~:/?#[\]@!$&'()*+,;=\u00A0-\uD7FF\uE000-\uFFFD]|%[0-9A-Fa-f]{2})*$/u;

function isBlank(value: string | undefined): boolean {
	return value === undefined || value.trim() === "";
}

/**
 * Check whether a link is an OPDS acquisition link.
 */
export function isAcquisitionLink(link: AnyLinkNode): boolean {
	return link.rel.some((rel) => rel.startsWith(ACQUISITION_REL_PREFIX));
}

/**
 * Check whether an href is a URI reference (IRI characters allowed).
 * Template expressions are skipped for templated links.
 */
export function isUriReference(href: string, templated = false): boolean {
	return URI_REFERENCE.test(templated ? href.replace(TEMPLATE_EXPRESSION, "") : href);
}

function hasRel(index: DocumentIndex, ...rels: string[]): boolean {
	return rels.some((rel) => index.linksByRel.has(rel));
}

export const feedCollectionRequired = defineRule({
	id: "feed-collection-required",
	severity: "error",
	description: "A feed lists publications, navigation or groups.",
	appliesTo: ["feed"],
	*check(node) {
		if (node.publications.length === 0 && node.navigation.length === 0 && node.groups.length === 0) {
			yield { message: "Feed has no publications, navigation or groups" };
		}
	},
});

export const publicationIdentifierRequired = defineRule({
	id: "publication-identifier-required",
	severity: "error",
	description: "Every publication has an identifier.",
	appliesTo: ["publication-metadata"],
	*check(node) {
		if (isBlank(node.identifier)) {
			yield { message: "Publication has no identifier" };
		}
	},
});

export const duplicateIdentifier = defineRule({
	id: "duplicate-identifier",
	severity: "error",
	description: "Publication identifiers are unique within the document.",
	appliesTo: ["publication-metadata"],
	*check(node, { index }) {
		if (node.identifier === undefined) {
			return;
		}
		const entries = index.identifiers.get(node.identifier) ?? [];
		if (entries.indexOf(node) > 0) {
			yield { message: `Identifier "${node.identifier}" is already used at ${formatPath(entries[0].path)}` };
		}
	},
});

export const acquisitionLinkRequired = defineRule({
	id: "acquisition-link-required",
	severity: "error",
	description: "A publication offers at least one acquisition link, or ODL licenses.",
	appliesTo: ["publication"],
	*check(node) {
		if (node.licenses.length === 0 && !node.links.some(isAcquisitionLink)) {
			yield {
				message: "Publication has no acquisition link",
				suggestion: `Add a link whose rel starts with "${ACQUISITION_REL_PREFIX}"`,
			};
		}
	},
});

export const odlLicense = defineRule({
	id: "odl-license",
	severity: "error",
	description: "ODL licenses carry an identifier and a borrow link.",
	appliesTo: ["publication"],
	*check(node) {
		for (const license of node.licenses) {
			if (isBlank(license.identifier)) {
				yield { message: "License has no identifier", path: childPath(license.path, "metadata") };
			}
			if (!license.links.some((link) => link.rel.includes(BORROW_REL))) {
				yield {
					message: "License has no borrow link",
					path: license.path,
					suggestion: `Add a link with rel "${BORROW_REL}"`,
				};
			}
		}
	},
});

export const acquisitionTypeRequired = defineRule({
	id: "acquisition-type-required",
	severity: "error",
	description: "Acquisition links declare the media type they deliver.",
	appliesTo: ["publication-link"],
	*check(node) {
		if (isAcquisitionLink(node) && node.type === undefined) {
			yield { message: "Acquisition link does not declare a media type" };
		}
	},
});

export const publicationImage = defineRule({
	id: "publication-image",
	severity: "warning",
	description: "OPDS 2 publications carry a cover image.",
	appliesTo: ["publication"],
	*check(node, { document }) {
		if (document.kind === "feed" && document.format !== "opds1" && node.images.length === 0) {
			yield { message: "Publication has no images" };
		}
	},
});

export const imageMediaType = defineRule({
	id: "image-media-type",
	severity: "warning",
	description: "Images declare an image media type.",
	appliesTo: ["image"],
	*check(node) {
		if (node.type === undefined) {
			yield { message: "Image does not declare a media type" };
		} else if (isMediaType(node.type) && !hasTopLevelType(node.type, "image")) {
			yield { message: `Image has non-image media type "${node.type}"` };
		}
	},
});

export const navigationTitleRequired = defineRule({
	id: "navigation-title-required",
	severity: "error",
	description: "Navigation links carry a title.",
	appliesTo: ["navigation-link"],
	*check(node) {
		if (isBlank(node.title)) {
			yield { message: "Navigation link has no title" };
		}
	},
});

export const linkUri = defineRule({
	id: "link-uri",
	severity: "error",
	description: "Catalog hrefs are valid URI references.",
	appliesTo: ["feed-link", "navigation-link", "publication-link", "image"],
	*check(node) {
		if (node.href !== undefined && node.href !== "" && !isUriReference(node.href, node.templated === true)) {
			yield {
				message: `"${node.href}" is not a valid URI reference`,
				suggestion: "Percent-encode spaces and reserved characters",
			};
		}
	},
});

export const paginationNext = defineRule({
	id: "pagination-next",
	severity: "warning",
	description: "A page that does not show every item links to the next page.",
	appliesTo: ["feed-metadata"],
	*check(node, { index }) {
		const { numberOfItems, itemsPerPage } = node;
		if (numberOfItems === undefined || itemsPerPage === undefined) {
			return;
		}
		const page = node.currentPage ?? 1;
		if (page * itemsPerPage < numberOfItems && !hasRel(index, "next")) {
			yield {
				message: `Feed has ${numberOfItems} items but no "next" link after page ${page}`,
				suggestion: 'Add a link with rel "next" to the following page',
			};
		}
	},
});

export const paginationPrevious = defineRule({
	id: "pagination-previous",
	severity: "warning",
	description: "A page after the first links back to an earlier page.",
	appliesTo: ["feed-metadata"],
	*check(node, { index }) {
		if (node.currentPage !== undefined && node.currentPage > 1 && !hasRel(index, "previous", "prev", "first")) {
			yield { message: `Page ${node.currentPage} has no "previous" or "first" link` };
		}
	},
});

export const feedContentType = defineRule({
	id: "feed-content-type",
	severity: "warning",
	description: "The self link declares the catalog media type.",
	appliesTo: ["feed-link"],
	*check(node, { document }) {
		if (document.kind !== "feed" || !node.rel.includes("self")) {
			return;
		}
		const expected = document.format === "opds1" ? OPDS1_FEED_TYPE : OPDS2_FEED_TYPE;
		if (node.type === undefined) {
			yield {
				message: "Self link does not declare a media type",
				suggestion: `Declare the type "${expected}"`,
			};
		} else if (mediaTypeEssence(node.type) !== expected) {
			yield { message: `Self link declares "${node.type}" instead of "${expected}"` };
		}
	},
});

export const groupContent = defineRule({
	id: "group-content",
	severity: "error",
	description: "A group has a titled metadata object and some content.",
	appliesTo: ["group"],
	*check(node) {
		if (!node.hasMetadata || isBlank(node.title)) {
			yield { message: "Group has no metadata title" };
		}
		if (node.navigation.length === 0 && node.publications.length === 0) {
			yield { message: "Group has neither navigation nor publications" };
		}
	},
});

/** OPDS feed rules. */
export const feedRules = [
	feedCollectionRequired,
	publicationIdentifierRequired,
	duplicateIdentifier,
	acquisitionLinkRequired,
	odlLicense,
	acquisitionTypeRequired,
	publicationImage,
	imageMediaType,
	navigationTitleRequired,
	linkUri,
	paginationNext,
	paginationPrevious,
	feedContentType,
	groupContent,
];
