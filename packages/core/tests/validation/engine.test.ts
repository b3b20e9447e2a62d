import { describe, it, expect } from "vitest";
import { validate } from "../../src/validation/engine.js";
import { createRuleSet, defineRule } from "../../src/validation/rule.js";
import { parseManifest } from "../../src/types/manifest.js";
import { parseFeed } from "../../src/types/feed.js";
import { parseAtomFeed } from "../../src/types/atom.js";
import { RuleCrashError, StructuralError } from "../../src/errors.js";
import { ATOM_FEED, canonicalFeed, canonicalManifest, twoTrackManifest } from "../fixtures.js";

function summarise(findings: readonly { ruleId: string; path: string; severity: string }[]): string[][] {
	return findings.map((finding) => [finding.ruleId, finding.path, finding.severity]);
}

describe("validate", () => {
	it("finds nothing in the canonical manifest", () => {
		const report = validate(parseManifest(canonicalManifest()));

		expect(report.valid).toBe(true);
		expect(report.findings).toEqual([]);
		expect(report.summary).toEqual({ errors: 0, warnings: 0, suppressed: 0 });
	});

	it("finds nothing in the canonical feeds", () => {
		expect(validate(parseFeed(canonicalFeed())).findings).toEqual([]);
		expect(validate(parseAtomFeed(ATOM_FEED)).findings).toEqual([]);
	});

	it("reports a dangling reading order reference once, at the item", () => {
		const raw = twoTrackManifest();
		raw.resources = [{ href: "track1.mp3", type: "audio/mpeg" }];

		const report = validate(parseManifest(raw));

		expect(report.valid).toBe(false);
		expect(report.findings).toHaveLength(1);
		expect(report.findings[0].severity).toBe("error");
		expect(report.findings[0].ruleId).toBe("dangling-reference");
		expect(report.findings[0].path).toBe("/readingOrder/1");
		expect(report.findings[0].nodePath).toEqual(["readingOrder", 1]);
		expect(report.findings[0].message).toBe('"track2.mp3" is not declared in resources');
	});

	it("reports a duration mismatch as a single warning", () => {
		const raw = twoTrackManifest();
		raw.readingOrder = [
			{ href: "track1.mp3", type: "audio/mpeg", duration: 60 },
			{ href: "track2.mp3", type: "audio/mpeg", duration: 41 },
		];

		const report = validate(parseManifest(raw));

		expect(report.valid).toBe(true);
		expect(report.findings).toHaveLength(1);
		expect(report.findings[0].severity).toBe("warning");
		expect(report.findings[0].ruleId).toBe("duration-mismatch");
		expect(report.findings[0].path).toBe("/metadata");
		expect(report.findings[0].message).toBe("Declared duration 100s differs from the reading order total 101s");
	});

	it("honours the duration tolerance", () => {
		const raw = twoTrackManifest();
		raw.readingOrder = [
			{ href: "track1.mp3", type: "audio/mpeg", duration: 60 },
			{ href: "track2.mp3", type: "audio/mpeg", duration: 41 },
		];

		const report = validate(parseManifest(raw), { durationTolerance: 1 });

		expect(report.findings).toEqual([]);
	});

	it("never reaches the rules when the reading order is missing", () => {
		const raw = canonicalManifest();
		delete raw.readingOrder;

		expect(() => validate(parseManifest(raw))).toThrow(StructuralError);
		expect(() => parseManifest(raw)).toThrow('Missing required field "readingOrder" (at /)');
	});

	it("reports every injected violation, including several on one node", () => {
		const raw = canonicalManifest();
		raw.metadata.readingProgression = "sideways";
		raw.readingOrder = [
			{ href: "track1.mp3", type: "video/mp4", duration: 100, bitrate: -1 },
			{ href: "track2.mp3", type: "audio/x-unknown" },
		];
		raw.resources = [
			{ href: "track1.mp3", type: "audio/mpeg" },
			{ href: "track2.mp3", type: "audio/mpeg" },
		];

		const report = validate(parseManifest(raw));

		expect(summarise(report.findings)).toEqual([
			["reading-progression", "/metadata", "error"],
			["non-positive-bitrate", "/readingOrder/0", "error"],
			["audio-media-type", "/readingOrder/0", "error"],
			["unknown-audio-type", "/readingOrder/1", "warning"],
			["missing-duration", "/readingOrder/1", "warning"],
		]);
		expect(report.summary).toEqual({ errors: 3, warnings: 2, suppressed: 0 });
	});

	it("is deterministic", () => {
		const raw = canonicalManifest();
		raw.metadata.identifier = "not a uri";
		raw.readingOrder = [{ href: "track9.mp3" }];

		const document = parseManifest(raw);
		const first = validate(document);
		const second = validate(document);

		expect(second).toEqual(first);
		expect(JSON.stringify(second)).toBe(JSON.stringify(first));
	});

	it("ignores the key order of metadata", () => {
		const raw = canonicalManifest();
		raw.metadata.identifier = "12345";
		raw.metadata.language = ["en", "not a tag"];
		raw.metadata.title = { en: "Title", fr: "Titre" };
		const reordered = canonicalManifest();
		reordered.metadata = Object.fromEntries(Object.entries(raw.metadata).reverse());
		reordered.metadata.title = { fr: "Titre", en: "Title" };

		const report = validate(parseManifest(raw));

		expect(report.findings.length).toBeGreaterThan(0);
		expect(JSON.stringify(validate(parseManifest(reordered)))).toBe(JSON.stringify(report));
	});

	it("replaces control characters in messages", () => {
		const raw = canonicalManifest();
		raw.metadata.language = "en\nGB";

		const [finding] = validate(parseManifest(raw)).findings;

		expect(finding.ruleId).toBe("language-code");
		expect(finding.message).toBe('"en GB" is not a BCP 47 language tag');
	});

	it("suppresses ignored findings and counts them", () => {
		const raw = twoTrackManifest();
		raw.readingOrder = [
			{ href: "track1.mp3", type: "audio/mpeg", duration: 60 },
			{ href: "track2.mp3", type: "audio/mpeg", duration: 41 },
		];

		const report = validate(parseManifest(raw), { ignore: ["duration-mismatch"] });

		expect(report.findings).toEqual([]);
		expect(report.summary.suppressed).toBe(1);
	});

	it("runs a caller-supplied rule set", () => {
		const ruleSet = createRuleSet([
			defineRule({
				id: "has-toc",
				severity: "warning",
				description: "Manifests carry a table of contents.",
				appliesTo: ["manifest"],
				*check(node) {
					if (node.toc === undefined) {
						yield { message: "No table of contents" };
					}
				},
			}),
		]);

		const report = validate(parseManifest(canonicalManifest()), { ruleSet });

		expect(summarise(report.findings)).toEqual([["has-toc", "/", "warning"]]);
	});

	it("fails the run when a rule throws", () => {
		const cause = new Error("unexpected shape");
		const ruleSet = createRuleSet([
			defineRule({
				id: "broken",
				severity: "error",
				description: "Always throws.",
				appliesTo: ["reading-order-item"],
				check() {
					throw cause;
				},
			}),
		]);

		try {
			validate(parseManifest(canonicalManifest()), { ruleSet });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(RuleCrashError);
			if (error instanceof RuleCrashError) {
				expect(error.ruleId).toBe("broken");
				expect(error.path).toEqual(["readingOrder", 0]);
				expect(error.cause).toBe(cause);
			}
		}
	});
});
