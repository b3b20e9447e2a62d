/**
 * @title Types Module
 * @description Document model for manifests and feeds.
 *
 * @module types
 */

import type { Feed, FeedMetadata, Group, Publication, PublicationMetadata } from "./feed.js";
import type { Manifest, ManifestMetadata } from "./manifest.js";
import type { AnyLinkNode, NodeType } from "./nodes.js";

export {
	type PathSegment,
	type NodePath,
	ROOT_PATH,
	childPath,
	formatPath,
	isPathPrefix,
} from "./path.js";

export {
	MANIFEST_NODE_TYPES,
	FEED_NODE_TYPES,
	NODE_TYPES,
	LINK_NODE_TYPES,
	type ManifestNodeType,
	type FeedNodeType,
	type NodeType,
	type LinkNodeType,
	type LocalizedString,
	type BaseNode,
	type LinkNode,
	type AnyLinkNode,
	isLinkNodeType,
	localizedValues,
} from "./nodes.js";

export {
	AUDIOBOOK_TYPE,
	AUDIOBOOK_PROFILE,
	type ManifestMetadata,
	type Manifest,
	parseManifest,
} from "./manifest.js";

export {
	type FeedFormat,
	type FeedMetadata,
	type PublicationMetadata,
	type License,
	type Publication,
	type Group,
	type Feed,
	parseFeed,
	parsePublications,
} from "./feed.js";

export { parseAtomFeed } from "./atom.js";

/**
 * A parsed manifest or feed.
 */
export type Document = Manifest | Feed;

/** Document variant tag. */
export type DocumentKind = Document["kind"];

/**
 * Every node that can appear in a document tree.
 */
export type DocumentNode =
	| Manifest
	| ManifestMetadata
	| Feed
	| FeedMetadata
	| Publication
	| PublicationMetadata
	| Group
	| AnyLinkNode;

/**
 * The node shape selected by a node type.
 */
export type NodeOfType<T extends NodeType> = Extract<DocumentNode, { nodeType: T }>;
