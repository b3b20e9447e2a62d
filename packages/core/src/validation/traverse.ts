/**
 * Deterministic document-order traversal. Every node is yielded exactly
 * once; link trees are walked depth-first, alternates before children.
 */

import type { AnyLinkNode } from "../types/nodes.js";
import type { Manifest } from "../types/manifest.js";
import type { Feed, Group, Publication } from "../types/feed.js";
import type { Document, DocumentNode } from "../types/index.js";

function* linkTree(link: AnyLinkNode): Generator<DocumentNode> {
	yield link;
	for (const alternate of link.alternate) {
		yield* linkTree(alternate);
	}
	for (const child of link.children) {
		yield* linkTree(child);
	}
}

function* linkTrees(links: readonly AnyLinkNode[]): Generator<DocumentNode> {
	for (const link of links) {
		yield* linkTree(link);
	}
}

function* manifestNodes(manifest: Manifest): Generator<DocumentNode> {
	yield manifest;
	yield manifest.metadata;
	yield* linkTrees(manifest.readingOrder);
	yield* linkTrees(manifest.resources ?? []);
	yield* linkTrees(manifest.links);
	yield* linkTrees(manifest.toc ?? []);
}

function* publicationNodes(publications: readonly Publication[]): Generator<DocumentNode> {
	for (const publication of publications) {
		yield publication;
		yield publication.metadata;
		yield* linkTrees(publication.links);
		yield* linkTrees(publication.images);
		for (const license of publication.licenses) {
			yield* linkTrees(license.links);
		}
	}
}

function* groupNodes(groups: readonly Group[]): Generator<DocumentNode> {
	for (const group of groups) {
		yield group;
		yield* linkTrees(group.navigation);
		yield* publicationNodes(group.publications);
		yield* linkTrees(group.links);
	}
}

function* feedNodes(feed: Feed): Generator<DocumentNode> {
	// A bare publication list has no feed-level content to check.
	if (feed.format === "opds2-publications") {
		yield* publicationNodes(feed.publications);
		return;
	}
	yield feed;
	yield feed.metadata;
	yield* publicationNodes(feed.publications);
	yield* linkTrees(feed.navigation);
	yield* groupNodes(feed.groups);
	yield* linkTrees(feed.links);
}

/**
 * Every node of a document in traversal order.
 */
export function walkDocument(document: Document): Generator<DocumentNode> {
	return document.kind === "manifest" ? manifestNodes(document) : feedNodes(document);
}
