import { describe, it, expect } from "vitest";
import { parseFeed, parsePublications } from "../../src/types/feed.js";
import { StructuralError } from "../../src/errors.js";
import { canonicalFeed, publicationFixture } from "../fixtures.js";

describe("parseFeed", () => {
	it("builds an OPDS 2 feed with paths", () => {
		const feed = parseFeed(canonicalFeed());

		expect(feed.kind).toBe("feed");
		expect(feed.format).toBe("opds2");
		expect(feed.metadata.title).toBe("Test Catalog");
		expect(feed.metadata.path).toEqual(["metadata"]);
		expect(feed.links[0].nodeType).toBe("feed-link");
		expect(feed.navigation[0].path).toEqual(["navigation", 0]);
		expect(feed.publications[0].path).toEqual(["publications", 0]);
		expect(feed.publications[0].metadata.path).toEqual(["publications", 0, "metadata"]);
		expect(feed.publications[0].links[0].path).toEqual(["publications", 0, "links", 0]);
		expect(feed.publications[0].images[0].nodeType).toBe("image");
		expect(feed.groups).toEqual([]);
	});

	it("builds groups with their own collections", () => {
		const raw = canonicalFeed();
		raw.groups = [
			{ metadata: { title: "Featured" }, publications: [publicationFixture(2)] },
			{ navigation: [{ href: "https://example.org/a.json", title: "A" }] },
		];

		const feed = parseFeed(raw);

		expect(feed.groups[0].title).toBe("Featured");
		expect(feed.groups[0].hasMetadata).toBe(true);
		expect(feed.groups[0].publications[0].path).toEqual(["groups", 0, "publications", 0]);
		expect(feed.groups[1].hasMetadata).toBe(false);
		expect(feed.groups[1].navigation[0].path).toEqual(["groups", 1, "navigation", 0]);
	});

	it("reads paging metadata", () => {
		const raw = canonicalFeed();
		raw.metadata = { title: "Paged", numberOfItems: 25, itemsPerPage: 10, currentPage: 2 };

		const feed = parseFeed(raw);

		expect(feed.metadata.numberOfItems).toBe(25);
		expect(feed.metadata.itemsPerPage).toBe(10);
		expect(feed.metadata.currentPage).toBe(2);
	});

	it("rejects a feed without metadata", () => {
		expect(() => parseFeed({ publications: [] })).toThrow(StructuralError);
	});

	it("rejects a non-integer page size", () => {
		const raw = canonicalFeed();
		raw.metadata = { title: "Paged", itemsPerPage: 2.5 };

		try {
			parseFeed(raw);
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(StructuralError);
			if (error instanceof StructuralError) {
				expect(error.path).toEqual(["metadata", "itemsPerPage"]);
			}
		}
	});
});

describe("parsePublications", () => {
	it("builds a bare publication list rooted at its indexes", () => {
		const feed = parsePublications([publicationFixture(1), publicationFixture(2)]);

		expect(feed.format).toBe("opds2-publications");
		expect(feed.links).toEqual([]);
		expect(feed.navigation).toEqual([]);
		expect(feed.publications.map((publication) => publication.path)).toEqual([[0], [1]]);
		expect(feed.publications[0].metadata.path).toEqual([0, "metadata"]);
		expect(feed.publications[1].links[0].path).toEqual([1, "links", 0]);
	});

	it("reads ODL licenses", () => {
		const publication = publicationFixture(1);
		publication.licenses = [
			{
				metadata: { identifier: "urn:uuid:license-1" },
				links: [{ rel: "http://opds-spec.org/acquisition/borrow", href: "https://example.org/borrow/1" }],
			},
		];

		const [parsed] = parsePublications([publication]).publications;

		expect(parsed.licenses).toHaveLength(1);
		expect(parsed.licenses[0].identifier).toBe("urn:uuid:license-1");
		expect(parsed.licenses[0].path).toEqual([0, "licenses", 0]);
		expect(parsed.licenses[0].links[0].path).toEqual([0, "licenses", 0, "links", 0]);
		expect(parsed.extra).toEqual({});
	});

	it("rejects a root that is not an array", () => {
		try {
			parsePublications(canonicalFeed());
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(StructuralError);
			if (error instanceof StructuralError) {
				expect(error.path).toEqual([]);
				expect(error.reason).toBe("Expected array, received object");
			}
		}
	});
});
