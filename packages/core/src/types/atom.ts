/**
 * @title Atom Feeds
 * @description Builds the feed model from an OPDS 1 (Atom) XML document.
 *
 * Paths follow the XML element names: the third entry's first link is
 * `/entry/2/link/0`. Feed and entry metadata share the path of the element
 * they are read from, since Atom has no separate metadata container.
 *
 * @module types
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { StructuralError } from "../errors.js";
import type { LinkNode, LinkNodeType } from "./nodes.js";
import { childPath, ROOT_PATH, type NodePath } from "./path.js";
import { buildLink, isLinkField } from "./build.js";
import type { RawLink } from "./raw.js";
import type { Feed, FeedMetadata, Publication, PublicationMetadata } from "./feed.js";

type XmlElement = Record<string, unknown>;

const ATTRIBUTE_PREFIX = "@_";
const REPEATABLE_ELEMENTS = new Set(["entry", "link", "author"]);

const ACQUISITION_REL_PREFIX = "http://opds-spec.org/acquisition";
const IMAGE_REL_PREFIX = "http://opds-spec.org/image";

const FEED_ELEMENTS = [
	"id",
	"title",
	"subtitle",
	"updated",
	"link",
	"entry",
	"totalResults",
	"itemsPerPage",
	"startIndex",
];
const ENTRY_ELEMENTS = ["id", "title", "subtitle", "author", "publisher", "language", "updated", "issued", "published", "link"];

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: ATTRIBUTE_PREFIX,
	removeNSPrefix: true,
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
	isArray: (name) => REPEATABLE_ELEMENTS.has(name),
});

function isElement(value: unknown): value is XmlElement {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Element content as an object; empty elements parse to "" and count as
 * having no children.
 */
function asElement(value: unknown): XmlElement {
	return isElement(value) ? value : {};
}

function asList(value: unknown): unknown[] {
	if (value === undefined) {
		return [];
	}
	return Array.isArray(value) ? value : [value];
}

/**
 * Text content of a single-valued child element.
 */
function text(element: XmlElement, name: string, path: NodePath): string | undefined {
	const value = element[name];
	if (Array.isArray(value)) {
		throw new StructuralError(childPath(path, name), `Element "${name}" must appear at most once`);
	}
	if (typeof value === "string") {
		return value;
	}
	if (isElement(value) && typeof value["#text"] === "string") {
		return value["#text"];
	}
	return undefined;
}

function integer(element: XmlElement, name: string, path: NodePath): number | undefined {
	const value = text(element, name, path);
	if (value === undefined) {
		return undefined;
	}
	if (!/^\d+$/.test(value)) {
		throw new StructuralError(childPath(path, name), `Expected an integer, received "${value}"`);
	}
	return Number(value);
}

function attribute(element: XmlElement, name: string): string | undefined {
	const value = element[`${ATTRIBUTE_PREFIX}${name}`];
	return typeof value === "string" ? value : undefined;
}

function unknownChildren(element: XmlElement, known: readonly string[]): Readonly<Record<string, unknown>> {
	const extra: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(element)) {
		if (!key.startsWith(ATTRIBUTE_PREFIX) && key !== "#text" && !known.includes(key)) {
			extra[key] = value;
		}
	}
	return Object.freeze(extra);
}

/**
 * Translate `<link>` attributes to the JSON link shape. `hreflang` becomes
 * `language`; attributes without a JSON counterpart are kept as extras.
 */
function rawLink(element: XmlElement): RawLink {
	const raw: RawLink = {
		href: attribute(element, "href"),
		type: attribute(element, "type"),
		rel: attribute(element, "rel"),
		title: attribute(element, "title"),
		language: attribute(element, "hreflang"),
	};
	for (const key of Object.keys(element)) {
		if (!key.startsWith(ATTRIBUTE_PREFIX)) {
			continue;
		}
		const name = key.slice(ATTRIBUTE_PREFIX.length);
		if (name !== "hreflang" && !isLinkField(name)) {
			raw[name] = element[key];
		}
	}
	for (const [key, value] of Object.entries(raw)) {
		if (value === undefined) {
			delete raw[key];
		}
	}
	return raw;
}

function linkElements(element: XmlElement): XmlElement[] {
	return asList(element.link).map(asElement);
}

function isAcquisition(link: XmlElement): boolean {
	return attribute(link, "rel")?.startsWith(ACQUISITION_REL_PREFIX) ?? false;
}

function isImage(link: XmlElement): boolean {
	return attribute(link, "rel")?.startsWith(IMAGE_REL_PREFIX) ?? false;
}

function isNavigationTarget(link: XmlElement): boolean {
	return attribute(link, "type")?.includes("kind=navigation") ?? false;
}

function buildAtomLink<T extends LinkNodeType>(nodeType: T, element: XmlElement, path: NodePath): LinkNode<T> {
	return buildLink(nodeType, rawLink(element), path);
}

function authorNames(entry: XmlElement, path: NodePath): readonly string[] {
	const names: string[] = [];
	asList(entry.author).forEach((author, i) => {
		const name = text(asElement(author), "name", childPath(path, "author", i));
		if (name !== undefined) {
			names.push(name);
		}
	});
	return Object.freeze(names);
}

function listOf(value: string | undefined): readonly string[] {
	return Object.freeze(value === undefined ? [] : [value]);
}

function buildEntryMetadata(entry: XmlElement, path: NodePath): PublicationMetadata {
	return Object.freeze({
		nodeType: "publication-metadata",
		path,
		identifier: text(entry, "id", path),
		title: text(entry, "title", path),
		subtitle: text(entry, "subtitle", path),
		author: authorNames(entry, path),
		publisher: listOf(text(entry, "publisher", path)),
		language: listOf(text(entry, "language", path)),
		modified: text(entry, "updated", path),
		published: text(entry, "issued", path) ?? text(entry, "published", path),
		extra: unknownChildren(entry, ENTRY_ELEMENTS),
		nulls: Object.freeze([]),
	});
}

function buildEntry(entry: XmlElement, path: NodePath): Publication {
	const links: LinkNode<"publication-link">[] = [];
	const images: LinkNode<"image">[] = [];
	linkElements(entry).forEach((link, j) => {
		const linkPath = childPath(path, "link", j);
		if (isImage(link)) {
			images.push(buildAtomLink("image", link, linkPath));
		} else {
			links.push(buildAtomLink("publication-link", link, linkPath));
		}
	});

	return Object.freeze({
		nodeType: "publication",
		path,
		metadata: buildEntryMetadata(entry, path),
		links: Object.freeze(links),
		images: Object.freeze(images),
		licenses: Object.freeze([]),
		extra: Object.freeze({}),
		nulls: Object.freeze([]),
	});
}

/**
 * A navigation entry: no acquisition link, but a link to another catalog
 * feed. The entry's title becomes the link title.
 */
function navigationLink(entry: XmlElement, path: NodePath): LinkNode<"navigation-link"> | undefined {
	const links = linkElements(entry);
	if (links.some(isAcquisition)) {
		return undefined;
	}
	const target = links.find(isNavigationTarget);
	if (!target) {
		return undefined;
	}
	const raw = rawLink(target);
	const title = text(entry, "title", path);
	if (title !== undefined) {
		raw.title = title;
	}
	return buildLink("navigation-link", raw, path);
}

/**
 * One-based page number from an OpenSearch `startIndex`, which is the
 * one-based index of the first item on the page.
 */
function currentPage(startIndex: number | undefined, itemsPerPage: number | undefined): number | undefined {
	if (startIndex === undefined || itemsPerPage === undefined || itemsPerPage === 0) {
		return undefined;
	}
	return Math.floor(Math.max(startIndex - 1, 0) / itemsPerPage) + 1;
}

function buildFeedMetadata(feed: XmlElement): FeedMetadata {
	const itemsPerPage = integer(feed, "itemsPerPage", ROOT_PATH);
	return Object.freeze({
		nodeType: "feed-metadata",
		path: ROOT_PATH,
		identifier: text(feed, "id", ROOT_PATH),
		title: text(feed, "title", ROOT_PATH),
		subtitle: text(feed, "subtitle", ROOT_PATH),
		modified: text(feed, "updated", ROOT_PATH),
		numberOfItems: integer(feed, "totalResults", ROOT_PATH),
		itemsPerPage,
		currentPage: currentPage(integer(feed, "startIndex", ROOT_PATH), itemsPerPage),
		extra: Object.freeze({}),
		nulls: Object.freeze([]),
	});
}

/**
 * Build a feed from OPDS 1 Atom XML.
 *
 * @param xml - Document text
 * @returns Immutable feed with `format` "opds1"
 * @throws StructuralError on malformed XML, a missing `<feed>` root or a
 * value of the wrong type
 */
export function parseAtomFeed(xml: string): Feed {
	const validation = XMLValidator.validate(xml);
	if (validation !== true) {
		const { msg, line } = validation.err;
		throw new StructuralError(ROOT_PATH, `Malformed XML: ${msg} (line ${line})`);
	}

	const parsed: unknown = parser.parse(xml);
	if (!isElement(parsed) || parsed.feed === undefined) {
		throw new StructuralError(ROOT_PATH, 'Missing required element "feed"');
	}
	const feed = asElement(parsed.feed);

	const navigation: LinkNode<"navigation-link">[] = [];
	const publications: Publication[] = [];
	asList(feed.entry).forEach((value, i) => {
		const entry = asElement(value);
		const path = childPath(ROOT_PATH, "entry", i);
		const link = navigationLink(entry, path);
		if (link) {
			navigation.push(link);
		} else {
			publications.push(buildEntry(entry, path));
		}
	});

	return Object.freeze({
		kind: "feed",
		format: "opds1",
		nodeType: "feed",
		path: ROOT_PATH,
		metadata: buildFeedMetadata(feed),
		links: Object.freeze(
			linkElements(feed).map((link, j) => buildAtomLink("feed-link", link, childPath(ROOT_PATH, "link", j))),
		),
		navigation: Object.freeze(navigation),
		publications: Object.freeze(publications),
		groups: Object.freeze([]),
		extra: unknownChildren(feed, FEED_ELEMENTS),
		nulls: Object.freeze([]),
	});
}
