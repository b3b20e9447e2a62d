/**
 * @title Raw Document Schemas
 * @description zod schemas for the JSON shapes of manifests and OPDS 2 feeds.
 *
 * These only check what the model cannot be built without: containers that
 * must exist and values of the right primitive type. Content rules (required
 * hrefs, titles, media types) belong to the rule set. Unknown keys pass
 * through untouched, and every known optional field accepts an explicit null.
 *
 * @module types
 */

import { z } from "zod";
import { StructuralError } from "../errors.js";
import type { NodePath } from "./path.js";

const localizedString = z.union([z.string(), z.record(z.string())]);
const stringOrList = z.union([z.string(), z.array(z.string())]);
const contributor = z.union([z.string(), z.object({ name: localizedString }).passthrough()]);
const contributors = z.union([contributor, z.array(contributor)]);

/**
 * A link object as written in JSON.
 */
export interface RawLink {
	href?: string | null;
	type?: string | null;
	rel?: string | string[] | null;
	title?: string | null;
	templated?: boolean | null;
	duration?: number | null;
	bitrate?: number | null;
	width?: number | null;
	height?: number | null;
	language?: string | string[] | null;
	properties?: Record<string, unknown> | null;
	alternate?: RawLink[] | null;
	children?: RawLink[] | null;
	[key: string]: unknown;
}

export const rawLinkSchema: z.ZodType<RawLink, z.ZodTypeDef, unknown> = z.lazy(() =>
	z
		.object({
			href: z.string().nullish(),
			type: z.string().nullish(),
			rel: stringOrList.nullish(),
			title: z.string().nullish(),
			templated: z.boolean().nullish(),
			duration: z.number().finite().nullish(),
			bitrate: z.number().finite().nullish(),
			width: z.number().finite().nullish(),
			height: z.number().finite().nullish(),
			language: stringOrList.nullish(),
			properties: z.record(z.unknown()).nullish(),
			alternate: z.array(rawLinkSchema).nullish(),
			children: z.array(rawLinkSchema).nullish(),
		})
		.passthrough(),
);

const linkList = z.array(rawLinkSchema);

export const rawManifestMetadataSchema = z
	.object({
		"@type": z.string().nullish(),
		conformsTo: stringOrList.nullish(),
		identifier: z.string().nullish(),
		title: localizedString.nullish(),
		subtitle: localizedString.nullish(),
		author: contributors.nullish(),
		narrator: contributors.nullish(),
		publisher: contributors.nullish(),
		language: stringOrList.nullish(),
		modified: z.string().nullish(),
		published: z.string().nullish(),
		duration: z.number().finite().nullish(),
		readingProgression: z.string().nullish(),
	})
	.passthrough();

export const rawManifestSchema = z
	.object({
		"@context": stringOrList.nullish(),
		metadata: rawManifestMetadataSchema,
		links: linkList.nullish(),
		readingOrder: linkList,
		resources: linkList.nullish(),
		toc: linkList.nullish(),
	})
	.passthrough();

export const rawFeedMetadataSchema = z
	.object({
		"@type": z.string().nullish(),
		identifier: z.string().nullish(),
		title: z.string().nullish(),
		subtitle: z.string().nullish(),
		modified: z.string().nullish(),
		numberOfItems: z.number().int().nullish(),
		itemsPerPage: z.number().int().nullish(),
		currentPage: z.number().int().nullish(),
	})
	.passthrough();

export const rawPublicationMetadataSchema = z
	.object({
		"@type": z.string().nullish(),
		identifier: z.string().nullish(),
		title: localizedString.nullish(),
		subtitle: localizedString.nullish(),
		author: contributors.nullish(),
		publisher: contributors.nullish(),
		language: stringOrList.nullish(),
		modified: z.string().nullish(),
		published: z.string().nullish(),
	})
	.passthrough();

export const rawLicenseSchema = z
	.object({
		metadata: z
			.object({
				identifier: z.string().nullish(),
			})
			.passthrough()
			.nullish(),
		links: linkList.nullish(),
	})
	.passthrough();

export const rawPublicationSchema = z
	.object({
		metadata: rawPublicationMetadataSchema,
		links: linkList.nullish(),
		images: linkList.nullish(),
		licenses: z.array(rawLicenseSchema).nullish(),
	})
	.passthrough();

export const rawPublicationListSchema = z.array(rawPublicationSchema);

export const rawGroupSchema = z
	.object({
		metadata: rawFeedMetadataSchema.nullish(),
		links: linkList.nullish(),
		navigation: linkList.nullish(),
		publications: z.array(rawPublicationSchema).nullish(),
	})
	.passthrough();

export const rawFeedSchema = z
	.object({
		metadata: rawFeedMetadataSchema,
		links: linkList.nullish(),
		navigation: linkList.nullish(),
		publications: z.array(rawPublicationSchema).nullish(),
		groups: z.array(rawGroupSchema).nullish(),
	})
	.passthrough();

export type RawManifestMetadata = z.infer<typeof rawManifestMetadataSchema>;
export type RawManifest = z.infer<typeof rawManifestSchema>;
export type RawFeedMetadata = z.infer<typeof rawFeedMetadataSchema>;
export type RawPublicationMetadata = z.infer<typeof rawPublicationMetadataSchema>;
export type RawLicense = z.infer<typeof rawLicenseSchema>;
export type RawPublication = z.infer<typeof rawPublicationSchema>;
export type RawGroup = z.infer<typeof rawGroupSchema>;
export type RawFeed = z.infer<typeof rawFeedSchema>;
export type RawContributors = z.infer<typeof contributors>;
export type RawLocalizedString = z.infer<typeof localizedString>;

/**
 * Parse a raw value against a schema, turning the first zod issue into a
 * StructuralError. A missing required key is reported at its parent, since
 * that is the node that lacks it.
 *
 * @param schema - Schema to apply
 * @param raw - Parsed JSON value
 * @returns The typed raw value
 * @throws StructuralError on the first mismatch
 */
export function parseRaw<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
	const result = schema.safeParse(raw);
	if (result.success) {
		return result.data;
	}

	const issue = result.error.issues[0];
	if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined" && issue.path.length > 0) {
		const parent: NodePath = issue.path.slice(0, -1);
		const key = issue.path[issue.path.length - 1];
		throw new StructuralError(parent, `Missing required field "${String(key)}"`);
	}
	if (issue.code === z.ZodIssueCode.invalid_union) {
		throw new StructuralError(issue.path, "Value does not match any of the accepted shapes");
	}
	throw new StructuralError(issue.path, issue.message);
}
