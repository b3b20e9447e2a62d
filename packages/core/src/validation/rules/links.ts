/**
 * @title Link Rules
 * @description Checks shared by every node with the link shape.
 *
 * @module validation
 */

import { LINK_NODE_TYPES, NODE_TYPES } from "../../types/nodes.js";
import { childPath } from "../../types/path.js";
import { isMediaType } from "../media-types.js";
import { defineRule } from "../rule.js";

const TEMPLATE_EXPRESSION = /\{[^{}]+\}/;

export const hrefRequired = defineRule({
	id: "href-required",
	severity: "error",
	description: "Every link has a non-empty href.",
	appliesTo: LINK_NODE_TYPES,
	*check(node) {
		if (node.href === undefined || node.href.trim() === "") {
			yield {
				message: "Link has no href",
				suggestion: "Add an href pointing at the linked resource",
			};
		}
	},
});

export const mediaTypeSyntax = defineRule({
	id: "media-type-syntax",
	severity: "error",
	description: "A declared link type is a type/subtype media type.",
	appliesTo: LINK_NODE_TYPES,
	*check(node) {
		if (node.type !== undefined && !isMediaType(node.type)) {
			yield { message: `"${node.type}" is not a valid media type` };
		}
	},
});

export const templatedHref = defineRule({
	id: "templated-href",
	severity: "warning",
	description: "A templated link contains at least one URI template expression.",
	appliesTo: LINK_NODE_TYPES,
	*check(node) {
		if (node.templated === true && node.href !== undefined && !TEMPLATE_EXPRESSION.test(node.href)) {
			yield {
				message: "Link is marked templated but its href has no {...} expression",
				suggestion: 'Remove "templated" or add a URI template expression',
			};
		}
	},
});

export const nonPositiveBitrate = defineRule({
	id: "non-positive-bitrate",
	severity: "error",
	description: "A declared bitrate is greater than zero.",
	appliesTo: ["reading-order-item", "resource"],
	*check(node) {
		if (node.bitrate !== undefined && !(node.bitrate > 0)) {
			yield { message: `Bitrate must be greater than 0, got ${node.bitrate}` };
		}
	},
});

export const invalidDimension = defineRule({
	id: "invalid-dimension",
	severity: "error",
	description: "Declared width and height are positive integers.",
	appliesTo: LINK_NODE_TYPES,
	*check(node) {
		for (const [field, value] of [
			["width", node.width],
			["height", node.height],
		] as const) {
			if (value !== undefined && !(Number.isInteger(value) && value > 0)) {
				yield {
					message: `${field} must be a positive integer, got ${value}`,
					path: childPath(node.path, field),
				};
			}
		}
	},
});

export const explicitNull = defineRule({
	id: "explicit-null",
	severity: "warning",
	description: "Optional fields are omitted rather than set to null.",
	appliesTo: NODE_TYPES,
	*check(node) {
		for (const field of node.nulls) {
			yield {
				message: `"${field}" is explicitly null`,
				path: childPath(node.path, field),
				suggestion: "Omit the field instead of setting it to null",
			};
		}
	},
});

/** Rules that apply to every link shape. */
export const linkRules = [hrefRequired, mediaTypeSyntax, templatedHref, nonPositiveBitrate, invalidDimension, explicitNull];
