/**
 * @title Document Loaders
 * @description Read manifests and feeds from files or pre-fetched bytes.
 *
 * Loaders only decode and parse. Fetching a document from the network is
 * the caller's concern: pass the bytes in as a `Uint8Array`.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import { DocumentReadError, getErrorMessage, StructuralError } from "../errors.js";
import { ROOT_PATH } from "../types/path.js";
import { parseManifest, type Manifest } from "../types/manifest.js";
import { parseFeed, parsePublications, type Feed } from "../types/feed.js";
import { parseAtomFeed } from "../types/atom.js";
import type { Document } from "../types/index.js";

/** A file path, or the raw bytes of a document. */
export type DocumentSource = string | Uint8Array;

/** What a source is expected to contain. */
export type SourceKind = "manifest" | "feed" | "publications";

const BYTE_ORDER_MARK = "\uFEFF";

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode document bytes as UTF-8.
 *
 * @throws StructuralError if the bytes are not valid UTF-8
 */
export function decodeDocument(bytes: Uint8Array): string {
	try {
		return decoder.decode(bytes);
	} catch (error) {
		throw new StructuralError(ROOT_PATH, "Input is not valid UTF-8", { cause: error });
	}
}

function toText(content: string | Uint8Array): string {
	const text = typeof content === "string" ? content : decodeDocument(content);
	return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new StructuralError(ROOT_PATH, `Malformed JSON: ${getErrorMessage(error)}`, { cause: error });
	}
}

/**
 * Parse manifest content.
 *
 * @param content - JSON text or its UTF-8 bytes
 * @returns Parsed manifest
 * @throws StructuralError if the content cannot form a manifest
 */
export function parseManifestContent(content: string | Uint8Array): Manifest {
	return parseManifest(parseJson(toText(content)));
}

/**
 * Parse feed content. Content whose first non-blank character is `<` is
 * read as OPDS 1 Atom XML, anything else as OPDS 2 JSON.
 *
 * @param content - Document text or its UTF-8 bytes
 * @returns Parsed feed
 * @throws StructuralError if the content cannot form a feed
 */
export function parseFeedContent(content: string | Uint8Array): Feed {
	const text = toText(content);
	if (text.trimStart().startsWith("<")) {
		return parseAtomFeed(text);
	}
	return parseFeed(parseJson(text));
}

/**
 * Parse a bare JSON array of OPDS 2 publications.
 *
 * @param content - JSON text or its UTF-8 bytes
 * @returns Feed with `format` "opds2-publications"
 * @throws StructuralError if the content is not an array of publications
 */
export function parsePublicationsContent(content: string | Uint8Array): Feed {
	return parsePublications(parseJson(toText(content)));
}

async function readSource(source: DocumentSource): Promise<Uint8Array> {
	if (typeof source !== "string") {
		return source;
	}
	try {
		return await fs.promises.readFile(source);
	} catch (error) {
		throw new DocumentReadError(source, { cause: error });
	}
}

async function load<T>(source: DocumentSource, parse: (content: Uint8Array) => T): Promise<T> {
	const bytes = await readSource(source);
	try {
		return parse(bytes);
	} catch (error) {
		if (error instanceof StructuralError && typeof source === "string") {
			throw error.withSource(source);
		}
		throw error;
	}
}

/**
 * Load a manifest from a file or from bytes.
 *
 * @param source - File path or document bytes
 * @returns Parsed manifest
 * @throws DocumentReadError if the file cannot be read
 * @throws StructuralError if the content cannot form a manifest
 *
 * @example
 * ```typescript
 * const manifest = await loadManifest("./book/manifest.json");
 * const report = validate(manifest);
 * ```
 */
export async function loadManifest(source: DocumentSource): Promise<Manifest> {
	return load(source, parseManifestContent);
}

/**
 * Load an OPDS 1 or OPDS 2 feed from a file or from bytes.
 *
 * @param source - File path or document bytes
 * @returns Parsed feed
 * @throws DocumentReadError if the file cannot be read
 * @throws StructuralError if the content cannot form a feed
 */
export async function loadFeed(source: DocumentSource): Promise<Feed> {
	return load(source, parseFeedContent);
}

/**
 * Load a bare JSON array of OPDS 2 publications from a file or from bytes.
 *
 * @param source - File path or document bytes
 * @returns Feed with `format` "opds2-publications"
 * @throws DocumentReadError if the file cannot be read
 * @throws StructuralError if the content is not an array of publications
 */
export async function loadPublications(source: DocumentSource): Promise<Feed> {
	return load(source, parsePublicationsContent);
}

/**
 * Load a source of the given kind.
 */
export async function loadDocument(source: DocumentSource, kind: SourceKind): Promise<Document> {
	switch (kind) {
		case "manifest":
			return loadManifest(source);
		case "feed":
			return loadFeed(source);
		case "publications":
			return loadPublications(source);
	}
}
