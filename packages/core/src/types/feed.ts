/**
 * @title Feed Types
 * @description Typed model of an OPDS catalog feed.
 *
 * OPDS 2 JSON feeds, OPDS 1 Atom feeds and bare OPDS 2 publication lists
 * are built into the same model; `format` records which one the source was,
 * and paths always follow the source document.
 *
 * @module types
 */

import type { BaseNode, LinkNode, LocalizedString } from "./nodes.js";
import { childPath, ROOT_PATH, type NodePath } from "./path.js";
import {
	buildLinks,
	contributorNames,
	extraFields,
	nullFields,
	present,
	toList,
	toLocalized,
} from "./build.js";
import {
	parseRaw,
	rawFeedSchema,
	type RawFeedMetadata,
	rawPublicationListSchema,
	type RawGroup,
	type RawLicense,
	type RawPublication,
	type RawPublicationMetadata,
} from "./raw.js";

/**
 * Source syntax of a feed. `opds2-publications` is a bare JSON array of
 * publications, as found under a feed's `publications` key.
 */
export type FeedFormat = "opds2" | "opds1" | "opds2-publications";

const FEED_FIELDS = ["metadata", "links", "navigation", "publications", "groups"] as const;
const FEED_METADATA_FIELDS = [
	"@type",
	"identifier",
	"title",
	"subtitle",
	"modified",
	"numberOfItems",
	"itemsPerPage",
	"currentPage",
] as const;
const PUBLICATION_FIELDS = ["metadata", "links", "images", "licenses"] as const;
const PUBLICATION_METADATA_FIELDS = [
	"@type",
	"identifier",
	"title",
	"subtitle",
	"author",
	"publisher",
	"language",
	"modified",
	"published",
] as const;
const GROUP_FIELDS = ["metadata", "links", "navigation", "publications"] as const;

/**
 * Feed-level metadata, including paging information.
 */
export interface FeedMetadata extends BaseNode<"feed-metadata"> {
	readonly type?: string;
	readonly identifier?: string;
	readonly title?: string;
	readonly subtitle?: string;
	readonly modified?: string;
	/** Total number of items across all pages. */
	readonly numberOfItems?: number;
	readonly itemsPerPage?: number;
	/** One-based page number. */
	readonly currentPage?: number;
}

/**
 * Metadata of one catalog entry.
 */
export interface PublicationMetadata extends BaseNode<"publication-metadata"> {
	readonly type?: string;
	readonly identifier?: string;
	readonly title?: LocalizedString;
	readonly subtitle?: LocalizedString;
	readonly author: readonly string[];
	readonly publisher: readonly string[];
	readonly language: readonly string[];
	readonly modified?: string;
	readonly published?: string;
}

/**
 * An ODL license offered for a publication. Licenses are checked as part of
 * their publication rather than walked as nodes.
 */
export interface License {
	readonly path: NodePath;
	readonly identifier?: string;
	readonly links: readonly LinkNode<"publication-link">[];
}

/**
 * One catalog entry.
 */
export interface Publication extends BaseNode<"publication"> {
	readonly metadata: PublicationMetadata;
	readonly links: readonly LinkNode<"publication-link">[];
	readonly images: readonly LinkNode<"image">[];
	/** ODL licenses; empty for plain OPDS publications. */
	readonly licenses: readonly License[];
}

/**
 * A titled collection inside a feed.
 */
export interface Group extends BaseNode<"group"> {
	/** Title from the group's metadata. */
	readonly title?: string;
	/** Whether the group declares a metadata object at all. */
	readonly hasMetadata: boolean;
	readonly links: readonly LinkNode<"feed-link">[];
	readonly navigation: readonly LinkNode<"navigation-link">[];
	readonly publications: readonly Publication[];
}

/**
 * Root of a feed document.
 */
export interface Feed extends BaseNode<"feed"> {
	readonly kind: "feed";
	readonly format: FeedFormat;
	readonly metadata: FeedMetadata;
	readonly links: readonly LinkNode<"feed-link">[];
	readonly navigation: readonly LinkNode<"navigation-link">[];
	readonly publications: readonly Publication[];
	readonly groups: readonly Group[];
}

function buildFeedMetadata(raw: RawFeedMetadata, path: NodePath): FeedMetadata {
	return Object.freeze({
		nodeType: "feed-metadata",
		path,
		type: present(raw["@type"]),
		identifier: present(raw.identifier),
		title: present(raw.title),
		subtitle: present(raw.subtitle),
		modified: present(raw.modified),
		numberOfItems: present(raw.numberOfItems),
		itemsPerPage: present(raw.itemsPerPage),
		currentPage: present(raw.currentPage),
		extra: extraFields(raw, FEED_METADATA_FIELDS),
		nulls: nullFields(raw, FEED_METADATA_FIELDS),
	});
}

function buildPublicationMetadata(raw: RawPublicationMetadata, path: NodePath): PublicationMetadata {
	return Object.freeze({
		nodeType: "publication-metadata",
		path,
		type: present(raw["@type"]),
		identifier: present(raw.identifier),
		title: toLocalized(raw.title),
		subtitle: toLocalized(raw.subtitle),
		author: contributorNames(raw.author),
		publisher: contributorNames(raw.publisher),
		language: toList(raw.language),
		modified: present(raw.modified),
		published: present(raw.published),
		extra: extraFields(raw, PUBLICATION_METADATA_FIELDS),
		nulls: nullFields(raw, PUBLICATION_METADATA_FIELDS),
	});
}

function buildLicense(raw: RawLicense, path: NodePath): License {
	return Object.freeze({
		path,
		identifier: present(raw.metadata?.identifier),
		links: buildLinks("publication-link", raw.links, path, "links"),
	});
}

function buildPublication(raw: RawPublication, path: NodePath): Publication {
	return Object.freeze({
		nodeType: "publication",
		path,
		metadata: buildPublicationMetadata(raw.metadata, childPath(path, "metadata")),
		links: buildLinks("publication-link", raw.links, path, "links"),
		images: buildLinks("image", raw.images, path, "images"),
		licenses: Object.freeze(
			(raw.licenses ?? []).map((license, i) => buildLicense(license, childPath(path, "licenses", i))),
		),
		extra: extraFields(raw, PUBLICATION_FIELDS),
		nulls: nullFields(raw, PUBLICATION_FIELDS),
	});
}

function buildPublications(raw: readonly RawPublication[] | null | undefined, parent: NodePath): readonly Publication[] {
	return Object.freeze(
		(raw ?? []).map((publication, i) => buildPublication(publication, childPath(parent, "publications", i))),
	);
}

function buildGroup(raw: RawGroup, path: NodePath): Group {
	return Object.freeze({
		nodeType: "group",
		path,
		title: present(raw.metadata?.title),
		hasMetadata: raw.metadata !== null && raw.metadata !== undefined,
		links: buildLinks("feed-link", raw.links, path, "links"),
		navigation: buildLinks("navigation-link", raw.navigation, path, "navigation"),
		publications: buildPublications(raw.publications, path),
		extra: extraFields(raw, GROUP_FIELDS),
		nulls: nullFields(raw, GROUP_FIELDS),
	});
}

/**
 * Build a feed from a parsed OPDS 2 JSON value.
 *
 * @param raw - Value produced by JSON.parse
 * @returns Immutable feed with a path on every node
 * @throws StructuralError if the value cannot form a feed
 */
export function parseFeed(raw: unknown): Feed {
	const data = parseRaw(rawFeedSchema, raw);

	return Object.freeze({
		kind: "feed",
		format: "opds2",
		nodeType: "feed",
		path: ROOT_PATH,
		metadata: buildFeedMetadata(data.metadata, childPath(ROOT_PATH, "metadata")),
		links: buildLinks("feed-link", data.links, ROOT_PATH, "links"),
		navigation: buildLinks("navigation-link", data.navigation, ROOT_PATH, "navigation"),
		publications: buildPublications(data.publications, ROOT_PATH),
		groups: Object.freeze((data.groups ?? []).map((group, i) => buildGroup(group, childPath(ROOT_PATH, "groups", i)))),
		extra: extraFields(data, FEED_FIELDS),
		nulls: nullFields(data, FEED_FIELDS),
	});
}

/**
 * Build a feed from a bare JSON array of OPDS 2 publications. The feed has
 * no metadata or links of its own, and publication paths start at the
 * array index: the first publication's metadata is at `/0/metadata`.
 *
 * @param raw - Value produced by JSON.parse
 * @returns Immutable feed with `format` "opds2-publications"
 * @throws StructuralError if the value is not an array of publications
 */
export function parsePublications(raw: unknown): Feed {
	const data = parseRaw(rawPublicationListSchema, raw);

	return Object.freeze({
		kind: "feed",
		format: "opds2-publications",
		nodeType: "feed",
		path: ROOT_PATH,
		metadata: buildFeedMetadata({}, ROOT_PATH),
		links: Object.freeze([]),
		navigation: Object.freeze([]),
		publications: Object.freeze(data.map((publication, i) => buildPublication(publication, childPath(ROOT_PATH, i)))),
		groups: Object.freeze([]),
		extra: Object.freeze({}),
		nulls: Object.freeze([]),
	});
}
