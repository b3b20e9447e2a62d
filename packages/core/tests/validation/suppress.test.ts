import { describe, it, expect } from "vitest";
import { createSuppressor, matchesIgnorePattern, parseIgnorePattern } from "../../src/validation/suppress.js";
import { createFinding } from "../../src/validation/report.js";

const nested = createFinding({
	severity: "warning",
	ruleId: "missing-duration",
	nodePath: ["readingOrder", 1, "alternate", 0],
	message: "Reading order item has no duration",
});

const item = createFinding({
	severity: "warning",
	ruleId: "missing-duration",
	nodePath: ["readingOrder", 1],
	message: "Reading order item has no duration",
});

describe("parseIgnorePattern", () => {
	it("reads the three pattern forms", () => {
		expect(parseIgnorePattern("missing-duration")).toEqual({ source: "missing-duration", ruleId: "missing-duration" });
		expect(parseIgnorePattern("/toc/**")).toEqual({ source: "/toc/**", pathGlob: "/toc/**" });
		expect(parseIgnorePattern("self-link@/links/*")).toEqual({
			source: "self-link@/links/*",
			ruleId: "self-link",
			pathGlob: "/links/*",
		});
	});

	it("skips blank patterns", () => {
		expect(parseIgnorePattern("   ")).toBeUndefined();
	});
});

describe("matchesIgnorePattern", () => {
	it("matches one segment with * and any depth with **", () => {
		const oneLevel = parseIgnorePattern("/readingOrder/*");
		const anyDepth = parseIgnorePattern("/readingOrder/**");
		if (!oneLevel || !anyDepth) {
			throw new Error("Expected patterns");
		}

		expect(matchesIgnorePattern(oneLevel, item)).toBe(true);
		expect(matchesIgnorePattern(oneLevel, nested)).toBe(false);
		expect(matchesIgnorePattern(anyDepth, nested)).toBe(true);
	});

	it("requires both the rule and the path to match", () => {
		const pattern = parseIgnorePattern("missing-duration@/readingOrder/1");
		const otherRule = parseIgnorePattern("dangling-reference@/readingOrder/1");
		if (!pattern || !otherRule) {
			throw new Error("Expected patterns");
		}

		expect(matchesIgnorePattern(pattern, item)).toBe(true);
		expect(matchesIgnorePattern(pattern, nested)).toBe(false);
		expect(matchesIgnorePattern(otherRule, item)).toBe(false);
	});
});

describe("createSuppressor", () => {
	it("suppresses when any pattern matches", () => {
		const isSuppressed = createSuppressor(["self-link", "/readingOrder/*"]);

		expect(isSuppressed(item)).toBe(true);
		expect(isSuppressed(nested)).toBe(false);
	});

	it("suppresses nothing without patterns", () => {
		expect(createSuppressor([])(item)).toBe(false);
	});
});
