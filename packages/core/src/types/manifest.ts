/**
 * @title Manifest Types
 * @description Typed model of an audiobook Readium Web Publication Manifest.
 *
 * @module types
 */

import type { BaseNode, LinkNode, LocalizedString } from "./nodes.js";
import { childPath, ROOT_PATH } from "./path.js";
import {
	buildLinks,
	contributorNames,
	extraFields,
	nullFields,
	present,
	toList,
	toLocalized,
} from "./build.js";
import { parseRaw, rawManifestSchema, type RawManifestMetadata } from "./raw.js";

/** schema.org type of an audiobook. */
export const AUDIOBOOK_TYPE = "http://schema.org/Audiobook";

/** Readium profile URI for audiobooks. */
export const AUDIOBOOK_PROFILE = "https://readium.org/webpub-manifest/profiles/audiobook";

const MANIFEST_FIELDS = ["@context", "metadata", "links", "readingOrder", "resources", "toc"] as const;

const METADATA_FIELDS = [
	"@type",
	"conformsTo",
	"identifier",
	"title",
	"subtitle",
	"author",
	"narrator",
	"publisher",
	"language",
	"modified",
	"published",
	"duration",
	"readingProgression",
] as const;

/**
 * Publication-level metadata of a manifest.
 */
export interface ManifestMetadata extends BaseNode<"manifest-metadata"> {
	/** The `@type` declaration. */
	readonly type?: string;
	readonly conformsTo: readonly string[];
	readonly identifier?: string;
	readonly title?: LocalizedString;
	readonly subtitle?: LocalizedString;
	readonly author: readonly string[];
	readonly narrator: readonly string[];
	readonly publisher: readonly string[];
	readonly language: readonly string[];
	readonly modified?: string;
	readonly published?: string;
	/** Declared total duration in seconds. */
	readonly duration?: number;
	readonly readingProgression?: string;
}

/**
 * Root of a manifest document.
 */
export interface Manifest extends BaseNode<"manifest"> {
	readonly kind: "manifest";
	readonly context: readonly string[];
	readonly metadata: ManifestMetadata;
	readonly links: readonly LinkNode<"manifest-link">[];
	readonly readingOrder: readonly LinkNode<"reading-order-item">[];
	/** Undefined when the manifest declares no `resources` list. */
	readonly resources?: readonly LinkNode<"resource">[];
	/** Undefined when the manifest declares no `toc` list. */
	readonly toc?: readonly LinkNode<"toc-entry">[];
}

function buildMetadata(raw: RawManifestMetadata): ManifestMetadata {
	const path = childPath(ROOT_PATH, "metadata");
	return Object.freeze({
		nodeType: "manifest-metadata",
		path,
		type: present(raw["@type"]),
		conformsTo: toList(raw.conformsTo),
		identifier: present(raw.identifier),
		title: toLocalized(raw.title),
		subtitle: toLocalized(raw.subtitle),
		author: contributorNames(raw.author),
		narrator: contributorNames(raw.narrator),
		publisher: contributorNames(raw.publisher),
		language: toList(raw.language),
		modified: present(raw.modified),
		published: present(raw.published),
		duration: present(raw.duration),
		readingProgression: present(raw.readingProgression),
		extra: extraFields(raw, METADATA_FIELDS),
		nulls: nullFields(raw, METADATA_FIELDS),
	});
}

/**
 * Build a manifest from a parsed JSON value.
 *
 * @param raw - Value produced by JSON.parse
 * @returns Immutable manifest with a path on every node
 * @throws StructuralError if the value cannot form a manifest
 */
export function parseManifest(raw: unknown): Manifest {
	const data = parseRaw(rawManifestSchema, raw);

	return Object.freeze({
		kind: "manifest",
		nodeType: "manifest",
		path: ROOT_PATH,
		context: toList(data["@context"]),
		metadata: buildMetadata(data.metadata),
		links: buildLinks("manifest-link", data.links, ROOT_PATH, "links"),
		readingOrder: buildLinks("reading-order-item", data.readingOrder, ROOT_PATH, "readingOrder"),
		resources: data.resources ? buildLinks("resource", data.resources, ROOT_PATH, "resources") : undefined,
		toc: data.toc ? buildLinks("toc-entry", data.toc, ROOT_PATH, "toc") : undefined,
		extra: extraFields(data, MANIFEST_FIELDS),
		nulls: nullFields(data, MANIFEST_FIELDS),
	});
}
