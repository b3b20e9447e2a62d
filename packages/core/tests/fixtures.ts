/**
 * Document builders shared by the tests. Each call returns a fresh, mutable
 * copy so a test can inject exactly the violation it is about.
 */

export interface LinkFixture {
	href?: string;
	type?: string;
	rel?: string | string[];
	title?: string;
	duration?: number;
	[key: string]: unknown;
}

export interface ManifestFixture {
	"@context"?: string;
	metadata: Record<string, unknown>;
	links?: LinkFixture[];
	readingOrder?: LinkFixture[];
	resources?: LinkFixture[];
	toc?: LinkFixture[];
	[key: string]: unknown;
}

export interface PublicationFixture {
	metadata: Record<string, unknown>;
	links?: LinkFixture[];
	images?: LinkFixture[];
	[key: string]: unknown;
}

export interface GroupFixture {
	metadata?: Record<string, unknown>;
	links?: LinkFixture[];
	navigation?: LinkFixture[];
	publications?: PublicationFixture[];
}

export interface FeedFixture {
	metadata: Record<string, unknown>;
	links?: LinkFixture[];
	navigation?: LinkFixture[];
	publications?: PublicationFixture[];
	groups?: GroupFixture[];
	[key: string]: unknown;
}

/**
 * The minimal valid audiobook manifest: one reading order item with a
 * matching resource, an audio media type and consistent durations.
 */
export function canonicalManifest(): ManifestFixture {
	return {
		"@context": "https://readium.org/webpub-manifest/context.jsonld",
		metadata: {
			"@type": "http://schema.org/Audiobook",
			identifier: "urn:isbn:9780000000001",
			title: "The Test Recording",
			author: "Test Author",
			language: "en",
			modified: "2024-01-15T10:00:00Z",
			duration: 100,
		},
		links: [{ rel: "self", href: "https://example.org/books/1/manifest.json", type: "application/audiobook+json" }],
		readingOrder: [{ href: "track1.mp3", type: "audio/mpeg", duration: 100 }],
		resources: [{ href: "track1.mp3", type: "audio/mpeg" }],
	};
}

/**
 * A two-track manifest whose durations add up to the declared total.
 */
export function twoTrackManifest(): ManifestFixture {
	const manifest = canonicalManifest();
	manifest.readingOrder = [
		{ href: "track1.mp3", type: "audio/mpeg", duration: 60 },
		{ href: "track2.mp3", type: "audio/mpeg", duration: 40 },
	];
	manifest.resources = [
		{ href: "track1.mp3", type: "audio/mpeg" },
		{ href: "track2.mp3", type: "audio/mpeg" },
	];
	return manifest;
}

/**
 * A valid OPDS 2 publication with the given sequence number.
 */
export function publicationFixture(n: number): PublicationFixture {
	return {
		metadata: {
			identifier: `urn:uuid:00000000-0000-0000-0000-00000000000${n}`,
			title: `Book ${n}`,
			language: "en",
			modified: "2024-01-01",
		},
		links: [
			{
				rel: "http://opds-spec.org/acquisition/open-access",
				href: `https://example.org/books/${n}.epub`,
				type: "application/epub+zip",
			},
		],
		images: [{ href: `https://example.org/covers/${n}.jpg`, type: "image/jpeg" }],
	};
}

/**
 * A valid OPDS 2 feed with one publication and one navigation link.
 */
export function canonicalFeed(): FeedFixture {
	return {
		metadata: { title: "Test Catalog" },
		links: [{ rel: "self", href: "https://example.org/catalog.json", type: "application/opds+json" }],
		navigation: [
			{
				rel: "http://opds-spec.org/sort/new",
				href: "https://example.org/new.json",
				type: "application/opds+json",
				title: "New",
			},
		],
		publications: [publicationFixture(1)],
	};
}

/**
 * A valid OPDS 1 feed: one acquisition entry and one navigation entry.
 */
export const ATOM_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:dc="http://purl.org/dc/terms/" xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">
	<id>urn:uuid:00000000-0000-0000-0000-0000000000aa</id>
	<title>Test Catalog</title>
	<updated>2024-01-01T00:00:00Z</updated>
	<opensearch:totalResults>2</opensearch:totalResults>
	<opensearch:itemsPerPage>2</opensearch:itemsPerPage>
	<opensearch:startIndex>1</opensearch:startIndex>
	<link rel="self" href="https://example.org/catalog.xml" type="application/atom+xml;profile=opds-catalog;kind=acquisition"/>
	<entry>
		<id>urn:uuid:00000000-0000-0000-0000-000000000001</id>
		<title>First Book</title>
		<author><name>Test Author</name></author>
		<dc:language>en</dc:language>
		<dc:issued>2023-05-01</dc:issued>
		<updated>2024-01-01T00:00:00Z</updated>
		<link rel="http://opds-spec.org/acquisition/open-access" href="https://example.org/books/1.epub" type="application/epub+zip"/>
		<link rel="http://opds-spec.org/image" href="https://example.org/covers/1.jpg" type="image/jpeg"/>
	</entry>
	<entry>
		<id>urn:uuid:00000000-0000-0000-0000-0000000000bb</id>
		<title>New Arrivals</title>
		<updated>2024-01-01T00:00:00Z</updated>
		<link rel="subsection" href="https://example.org/new.xml" type="application/atom+xml;profile=opds-catalog;kind=navigation"/>
	</entry>
</feed>
`;
