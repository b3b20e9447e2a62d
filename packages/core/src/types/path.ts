/**
 * @title Node Paths
 * @description Addressing scheme shared by every node and finding.
 *
 * A path is the sequence of object keys and array indices leading from the
 * document root to a node. It is the only way a finding can point back into
 * the source document.
 *
 * @module types
 */

/** A single object key or array index. */
export type PathSegment = string | number;

/** Keys and indices from the document root. */
export type NodePath = readonly PathSegment[];

/** Path of the document root. */
export const ROOT_PATH: NodePath = Object.freeze([]);

/**
 * Extend a path with further segments.
 *
 * @param parent - Path of the parent node
 * @param segments - Keys or indices to append
 * @returns A new frozen path
 */
export function childPath(parent: NodePath, ...segments: PathSegment[]): NodePath {
	return Object.freeze([...parent, ...segments]);
}

/**
 * Render a path as a JSON Pointer (RFC 6901).
 * The root path renders as "/".
 *
 * @param path - Path to render
 * @returns Pointer string such as "/readingOrder/1"
 */
export function formatPath(path: NodePath): string {
	if (path.length === 0) {
		return "/";
	}
	return path.map((segment) => `/${String(segment).replace(/~/g, "~0").replace(/\//g, "~1")}`).join("");
}

/**
 * Check whether `prefix` addresses `path` itself or one of its ancestors.
 */
export function isPathPrefix(prefix: NodePath, path: NodePath): boolean {
	if (prefix.length > path.length) {
		return false;
	}
	return prefix.every((segment, i) => segment === path[i]);
}
