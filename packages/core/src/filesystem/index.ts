/**
 * @title Filesystem Module
 * @description Document loading and file discovery.
 *
 * @module filesystem
 */

export {
	type DocumentSource,
	type SourceKind,
	decodeDocument,
	parseManifestContent,
	parseFeedContent,
	parsePublicationsContent,
	loadManifest,
	loadFeed,
	loadPublications,
	loadDocument,
} from "./load.js";

export { type DiscoveryOptions, type DiscoveryResult, findDocumentFiles } from "./discovery.js";
