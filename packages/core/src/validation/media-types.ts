/**
 * Media type helpers (RFC 6838 syntax, parameters ignored for comparison).
 */

const TOKEN = "[A-Za-z0-9!#$&^_.+-]+";
const MEDIA_TYPE = new RegExp(`^${TOKEN}/${TOKEN}(\\s*;\\s*${TOKEN}=(?:${TOKEN}|"[^"]*"))*\\s*$`);

/** Catalog media type of OPDS 2 feeds. */
export const OPDS2_FEED_TYPE = "application/opds+json";

/** Catalog media type of OPDS 1 feeds. */
export const OPDS1_FEED_TYPE = "application/atom+xml";

/** Audio media types that players are expected to handle. */
export const KNOWN_AUDIO_TYPES: ReadonlySet<string> = new Set([
	"audio/mpeg",
	"audio/mp4",
	"audio/aac",
	"audio/ogg",
	"audio/opus",
	"audio/webm",
	"audio/flac",
	"audio/wav",
	"audio/x-wav",
	"audio/x-m4a",
	"audio/x-m4b",
]);

/**
 * Check that a value is a `type/subtype` media type with optional parameters.
 */
export function isMediaType(value: string): boolean {
	return MEDIA_TYPE.test(value.trim());
}

/**
 * The lower-cased `type/subtype` part of a media type.
 */
export function mediaTypeEssence(value: string): string {
	const separator = value.indexOf(";");
	return (separator === -1 ? value : value.slice(0, separator)).trim().toLowerCase();
}

/**
 * Check whether a media type's top-level type is `topLevel`.
 */
export function hasTopLevelType(value: string, topLevel: string): boolean {
	return mediaTypeEssence(value).startsWith(`${topLevel}/`);
}
