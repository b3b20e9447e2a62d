import { describe, it, expect } from "vitest";
import { buildDocumentIndex, isInternalHref, normaliseHref } from "../../src/validation/document-index.js";
import { walkDocument } from "../../src/validation/traverse.js";
import { parseManifest } from "../../src/types/manifest.js";
import { parseFeed } from "../../src/types/feed.js";
import { formatPath } from "../../src/types/path.js";
import { canonicalFeed, publicationFixture, twoTrackManifest } from "../fixtures.js";

describe("href helpers", () => {
	it("normalises fragments and leading ./", () => {
		expect(normaliseHref("./audio/track1.mp3#t=30")).toBe("audio/track1.mp3");
		expect(normaliseHref("track1.mp3")).toBe("track1.mp3");
	});

	it("treats only scheme-less, non protocol-relative hrefs as internal", () => {
		expect(isInternalHref("track1.mp3")).toBe(true);
		expect(isInternalHref("../audio/track1.mp3")).toBe(true);
		expect(isInternalHref("https://cdn.example.org/track1.mp3")).toBe(false);
		expect(isInternalHref("//cdn.example.org/track1.mp3")).toBe(false);
		expect(isInternalHref("urn:uuid:1")).toBe(false);
		expect(isInternalHref("")).toBe(false);
	});
});

describe("buildDocumentIndex", () => {
	it("indexes manifest resources and durations", () => {
		const index = buildDocumentIndex(parseManifest(twoTrackManifest()));

		expect(index.declaresResources).toBe(true);
		expect([...index.resourcesByHref.keys()]).toEqual(["track1.mp3", "track2.mp3"]);
		expect(index.readingOrderDuration).toEqual({ total: 100, declared: 2, items: 2 });
		expect(index.linksByRel.get("self")).toHaveLength(1);
	});

	it("indexes feed identifiers across groups", () => {
		const raw = canonicalFeed();
		raw.groups = [{ metadata: { title: "Featured" }, publications: [publicationFixture(1)] }];

		const index = buildDocumentIndex(parseFeed(raw));
		const entries = index.identifiers.get("urn:uuid:00000000-0000-0000-0000-000000000001") ?? [];

		expect(entries.map((entry) => formatPath(entry.path))).toEqual([
			"/publications/0/metadata",
			"/groups/0/publications/0/metadata",
		]);
	});
});

describe("walkDocument", () => {
	it("visits manifest nodes in document order, depth first", () => {
		const raw = twoTrackManifest();
		raw.readingOrder = [
			{
				href: "track1.mp3",
				type: "audio/mpeg",
				duration: 100,
				alternate: [{ href: "track1.ogg", type: "audio/ogg" }],
			},
		];
		raw.toc = [{ href: "track1.mp3", children: [{ href: "track1.mp3#t=10" }] }];

		const paths = [...walkDocument(parseManifest(raw))].map((node) => formatPath(node.path));

		expect(paths).toEqual([
			"/",
			"/metadata",
			"/readingOrder/0",
			"/readingOrder/0/alternate/0",
			"/resources/0",
			"/resources/1",
			"/links/0",
			"/toc/0",
			"/toc/0/children/0",
		]);
	});

	it("visits feed nodes in document order", () => {
		const raw = canonicalFeed();
		raw.groups = [{ metadata: { title: "Featured" }, navigation: [{ href: "https://example.org/a.json", title: "A" }] }];

		const nodes = [...walkDocument(parseFeed(raw))].map((node) => `${node.nodeType} ${formatPath(node.path)}`);

		expect(nodes).toEqual([
			"feed /",
			"feed-metadata /metadata",
			"publication /publications/0",
			"publication-metadata /publications/0/metadata",
			"publication-link /publications/0/links/0",
			"image /publications/0/images/0",
			"navigation-link /navigation/0",
			"group /groups/0",
			"navigation-link /groups/0/navigation/0",
			"feed-link /links/0",
		]);
	});
});
