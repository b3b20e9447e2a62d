/**
 * @title Node Types
 * @description Shared shape of every addressable node in a document tree.
 *
 * @module types
 */

import type { NodePath } from "./path.js";

/** Node types that only occur in manifests. */
export const MANIFEST_NODE_TYPES = [
	"manifest",
	"manifest-metadata",
	"reading-order-item",
	"resource",
	"manifest-link",
	"toc-entry",
] as const;

/** Node types that only occur in feeds. */
export const FEED_NODE_TYPES = [
	"feed",
	"feed-metadata",
	"feed-link",
	"navigation-link",
	"publication",
	"publication-metadata",
	"publication-link",
	"image",
	"group",
] as const;

/** Every node type, in no particular order. */
export const NODE_TYPES = [...MANIFEST_NODE_TYPES, ...FEED_NODE_TYPES] as const;

/** Node types that carry the link shape. */
export const LINK_NODE_TYPES = [
	"reading-order-item",
	"resource",
	"manifest-link",
	"toc-entry",
	"feed-link",
	"navigation-link",
	"publication-link",
	"image",
] as const;

const LINK_NODE_TYPE_SET: ReadonlySet<NodeType> = new Set<NodeType>(LINK_NODE_TYPES);

export type ManifestNodeType = (typeof MANIFEST_NODE_TYPES)[number];
export type FeedNodeType = (typeof FEED_NODE_TYPES)[number];
export type NodeType = (typeof NODE_TYPES)[number];
export type LinkNodeType = (typeof LINK_NODE_TYPES)[number];

/**
 * A string, or a map of BCP 47 language tags to translations.
 */
export type LocalizedString = string | Readonly<Record<string, string>>;

/**
 * Fields common to every node.
 */
export interface BaseNode<T extends NodeType> {
	/** Dispatch tag deciding which rules apply. */
	readonly nodeType: T;
	/** Location from the document root. */
	readonly path: NodePath;
	/** Unknown fields, preserved verbatim and never validated. */
	readonly extra: Readonly<Record<string, unknown>>;
	/** Known optional fields that were written as an explicit null. */
	readonly nulls: readonly string[];
}

/**
 * A link object: reading-order items, resources, ToC entries,
 * catalog links and images all share this shape.
 */
export interface LinkNode<T extends LinkNodeType = LinkNodeType> extends BaseNode<T> {
	readonly href?: string;
	/** Declared media type. */
	readonly type?: string;
	/** Link relations, always normalised to a list. */
	readonly rel: readonly string[];
	readonly title?: string;
	readonly templated?: boolean;
	/** Duration in seconds. */
	readonly duration?: number;
	/** Bitrate in kilobits per second. */
	readonly bitrate?: number;
	readonly width?: number;
	readonly height?: number;
	readonly language: readonly string[];
	readonly properties?: Readonly<Record<string, unknown>>;
	/** Whether this link is an alternate rendition of its parent link. */
	readonly isAlternate: boolean;
	/** Alternate renditions of the same resource. */
	readonly alternate: readonly LinkNode<T>[];
	/** Nested links, such as ToC sub-entries. */
	readonly children: readonly LinkNode<T>[];
}

/**
 * Union of every link node, distributed over the node type so that
 * narrowing on `nodeType` selects a single member.
 */
export type AnyLinkNode = { [K in LinkNodeType]: LinkNode<K> }[LinkNodeType];

/**
 * Check whether a node type carries the link shape.
 */
export function isLinkNodeType(nodeType: NodeType): nodeType is LinkNodeType {
	return LINK_NODE_TYPE_SET.has(nodeType);
}

/**
 * All translations of a localized string, ordered by language tag so the
 * key order of the source never shows through.
 */
export function localizedValues(value: LocalizedString): string[] {
	if (typeof value === "string") {
		return [value];
	}
	return Object.keys(value)
		.sort()
		.map((key) => value[key]);
}
