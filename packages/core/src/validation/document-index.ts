/**
 * @title Document Index
 * @description Read-only whole-document indices built before rules run.
 *
 * Cross-referential rules (dangling references, duplicates, duration sums,
 * pagination) consult these instead of walking the document themselves.
 *
 * @module validation
 */

import type { LinkNode, AnyLinkNode } from "../types/nodes.js";
import type { Manifest } from "../types/manifest.js";
import type { Feed, Publication, PublicationMetadata } from "../types/feed.js";
import type { Document } from "../types/index.js";

/**
 * Totals of the top-level reading order durations.
 */
export interface DurationSummary {
	/** Sum of the declared durations. */
	readonly total: number;
	/** Number of items that declare a duration. */
	readonly declared: number;
	/** Number of top-level reading order items. */
	readonly items: number;
}

/**
 * Indices over one document.
 */
export interface DocumentIndex {
	/** Top-level resources keyed by normalised href. */
	readonly resourcesByHref: ReadonlyMap<string, readonly LinkNode<"resource">[]>;
	/** Whether the manifest has a `resources` list at all. */
	readonly declaresResources: boolean;
	/** Top-level reading order items keyed by normalised href. */
	readonly readingOrderByHref: ReadonlyMap<string, readonly LinkNode<"reading-order-item">[]>;
	readonly readingOrderDuration: DurationSummary;
	/** Publication metadata keyed by identifier, in traversal order. */
	readonly identifiers: ReadonlyMap<string, readonly PublicationMetadata[]>;
	/** Document-level links keyed by each of their relations. */
	readonly linksByRel: ReadonlyMap<string, readonly AnyLinkNode[]>;
}

const SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;

/**
 * Check whether an href points inside the publication: no scheme and not
 * protocol-relative.
 */
export function isInternalHref(href: string): boolean {
	return href.length > 0 && !SCHEME.test(href) && !href.startsWith("//");
}

/**
 * Key used to compare hrefs: fragment removed, leading "./" removed.
 */
export function normaliseHref(href: string): string {
	const hash = href.indexOf("#");
	let result = hash === -1 ? href : href.slice(0, hash);
	while (result.startsWith("./")) {
		result = result.slice(2);
	}
	return result;
}

function groupBy<T>(items: readonly T[], keys: (item: T) => readonly string[]): ReadonlyMap<string, readonly T[]> {
	const map = new Map<string, T[]>();
	for (const item of items) {
		for (const key of keys(item)) {
			const list = map.get(key) ?? [];
			list.push(item);
			map.set(key, list);
		}
	}
	return map;
}

function hrefKey(link: AnyLinkNode): readonly string[] {
	return link.href ? [normaliseHref(link.href)] : [];
}

function durationSummary(items: readonly LinkNode<"reading-order-item">[]): DurationSummary {
	let total = 0;
	let declared = 0;
	for (const item of items) {
		if (item.duration !== undefined) {
			total += item.duration;
			declared++;
		}
	}
	return Object.freeze({ total, declared, items: items.length });
}

function feedPublications(feed: Feed): Publication[] {
	return [...feed.publications, ...feed.groups.flatMap((group) => group.publications)];
}

function indexManifest(manifest: Manifest): DocumentIndex {
	return Object.freeze({
		resourcesByHref: groupBy(manifest.resources ?? [], hrefKey),
		declaresResources: manifest.resources !== undefined,
		readingOrderByHref: groupBy(manifest.readingOrder, hrefKey),
		readingOrderDuration: durationSummary(manifest.readingOrder),
		identifiers: new Map<string, readonly PublicationMetadata[]>(),
		linksByRel: groupBy<AnyLinkNode>(manifest.links, (link) => link.rel),
	});
}

function indexFeed(feed: Feed): DocumentIndex {
	const metadata = feedPublications(feed).map((publication) => publication.metadata);
	return Object.freeze({
		resourcesByHref: new Map<string, readonly LinkNode<"resource">[]>(),
		declaresResources: false,
		readingOrderByHref: new Map<string, readonly LinkNode<"reading-order-item">[]>(),
		readingOrderDuration: durationSummary([]),
		identifiers: groupBy(metadata, (entry) => (entry.identifier ? [entry.identifier] : [])),
		linksByRel: groupBy<AnyLinkNode>(feed.links, (link) => link.rel),
	});
}

/**
 * Collect the indices rules need, in one pass over the document.
 *
 * @param document - Document about to be validated
 * @returns Frozen index
 */
export function buildDocumentIndex(document: Document): DocumentIndex {
	return document.kind === "manifest" ? indexManifest(document) : indexFeed(document);
}
