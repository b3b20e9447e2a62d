/**
 * Helpers shared by the manifest and feed builders: they attach paths,
 * split known fields from unknown ones, record explicit nulls and freeze
 * the result.
 */

import type { LinkNode, LinkNodeType, LocalizedString } from "./nodes.js";
import { childPath, type NodePath } from "./path.js";
import type { RawContributors, RawLink, RawLocalizedString } from "./raw.js";

const LINK_FIELDS = [
	"href",
	"type",
	"rel",
	"title",
	"templated",
	"duration",
	"bitrate",
	"width",
	"height",
	"language",
	"properties",
	"alternate",
	"children",
] as const;

const LINK_FIELD_SET: ReadonlySet<string> = new Set<string>(LINK_FIELDS);

/**
 * Check whether a key is one of the known link fields.
 */
export function isLinkField(key: string): boolean {
	return LINK_FIELD_SET.has(key);
}

/**
 * Unknown fields of a raw object: every key not in `known`.
 */
export function extraFields(raw: Record<string, unknown>, known: readonly string[]): Readonly<Record<string, unknown>> {
	const extra: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(raw)) {
		if (!known.includes(key)) {
			extra[key] = value;
		}
	}
	return Object.freeze(extra);
}

/**
 * Known fields whose value is an explicit null, in `known` order.
 */
export function nullFields(raw: Record<string, unknown>, known: readonly string[]): readonly string[] {
	return Object.freeze(known.filter((key) => raw[key] === null));
}

/**
 * Drop null, keeping undefined for absent values.
 */
export function present<T>(value: T | null | undefined): T | undefined {
	return value === null ? undefined : value;
}

/**
 * Normalise a string-or-list field to a frozen list.
 */
export function toList(value: string | readonly string[] | null | undefined): readonly string[] {
	if (value === null || value === undefined) {
		return Object.freeze([]);
	}
	return Object.freeze(typeof value === "string" ? [value] : [...value]);
}

/**
 * Copy a localized string so later edits to the raw input cannot leak in.
 */
export function toLocalized(value: RawLocalizedString | null | undefined): LocalizedString | undefined {
	if (value === null || value === undefined) {
		return undefined;
	}
	return typeof value === "string" ? value : Object.freeze({ ...value });
}

/**
 * Contributor names, whatever form they were written in. A name given as a
 * language map contributes its translations in language-tag order.
 */
export function contributorNames(value: RawContributors | null | undefined): readonly string[] {
	if (value === null || value === undefined) {
		return Object.freeze([]);
	}
	const entries = Array.isArray(value) ? value : [value];
	const names: string[] = [];
	for (const entry of entries) {
		if (typeof entry === "string") {
			names.push(entry);
		} else if (typeof entry.name === "string") {
			names.push(entry.name);
		} else {
			const map = entry.name;
			names.push(...Object.keys(map).sort().map((key) => map[key]));
		}
	}
	return Object.freeze(names);
}

/**
 * Build a link node (with its alternates and children) from a raw link.
 *
 * @param nodeType - Node type for the link and its descendants
 * @param raw - Link as parsed from JSON
 * @param path - Path of the link
 * @param isAlternate - Whether the link sits in its parent's `alternate` list
 * @returns Frozen link node
 */
export function buildLink<T extends LinkNodeType>(
	nodeType: T,
	raw: RawLink,
	path: NodePath,
	isAlternate = false,
): LinkNode<T> {
	const alternate = (raw.alternate ?? []).map((child, i) =>
		buildLink(nodeType, child, childPath(path, "alternate", i), true),
	);
	const children = (raw.children ?? []).map((child, i) => buildLink(nodeType, child, childPath(path, "children", i)));

	return Object.freeze({
		nodeType,
		path,
		href: present(raw.href),
		type: present(raw.type),
		rel: toList(raw.rel),
		title: present(raw.title),
		templated: present(raw.templated),
		duration: present(raw.duration),
		bitrate: present(raw.bitrate),
		width: present(raw.width),
		height: present(raw.height),
		language: toList(raw.language),
		properties: raw.properties ? Object.freeze({ ...raw.properties }) : undefined,
		isAlternate,
		alternate: Object.freeze(alternate),
		children: Object.freeze(children),
		extra: extraFields(raw, LINK_FIELDS),
		nulls: nullFields(raw, LINK_FIELDS),
	});
}

/**
 * Build a list of links found under `key` of the parent path.
 */
export function buildLinks<T extends LinkNodeType>(
	nodeType: T,
	raw: readonly RawLink[] | null | undefined,
	parent: NodePath,
	key: string,
): readonly LinkNode<T>[] {
	return Object.freeze((raw ?? []).map((link, i) => buildLink(nodeType, link, childPath(parent, key, i))));
}
