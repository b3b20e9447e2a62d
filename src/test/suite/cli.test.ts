import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { run } from "../../cli.js";
import { configureLogger } from "../../utils/log.js";
import type { CommandIO } from "../../commands/validate.js";
import {
	canonicalFeed,
	canonicalManifest,
	publicationFixture,
	twoTrackManifest,
} from "../../../packages/core/tests/fixtures.js";

describe("shelfcheck CLI", () => {
	let tempDir: string;
	let stdout: string;
	let stderr: string;
	let io: CommandIO;

	const write = (name: string, value: unknown): void => {
		fs.writeFileSync(path.join(tempDir, name), typeof value === "string" ? value : JSON.stringify(value));
	};

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-test-"));
		stdout = "";
		stderr = "";
		io = {
			cwd: tempDir,
			env: {},
			stdout: (text) => {
				stdout += text;
			},
			stderr: (text) => {
				stderr += text;
			},
		};
		configureLogger("error", { write: () => undefined });
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("passes a valid manifest", async () => {
		write("good.json", canonicalManifest());

		expect(await run(["manifest", "good.json", "--no-color"], io)).toBe(0);
		expect(stdout).toBe("good.json\nResult: PASS (0 error(s), 0 warning(s))\n");
	});

	it("fails an invalid manifest with status 1", async () => {
		const raw = twoTrackManifest();
		raw.resources = [{ href: "track1.mp3", type: "audio/mpeg" }];
		write("bad.json", raw);

		expect(await run(["manifest", "bad.json", "--no-color"], io)).toBe(1);
		expect(stdout).toBe(
			[
				"bad.json",
				'[ERROR] /readingOrder/1 dangling-reference: "track2.mp3" is not declared in resources',
				"        Suggestion: Add a matching entry to resources or fix the href",
				"",
				"Result: FAIL (1 error(s), 0 warning(s))",
				"",
			].join("\n"),
		);
	});

	it("exits with status 2 when a document is unusable", async () => {
		write("good.json", canonicalManifest());
		write("broken.json", { metadata: {} });

		expect(await run(["manifest", "good.json", "broken.json", "--no-color"], io)).toBe(2);
		expect(stdout).toBe(
			[
				"good.json",
				"Result: PASS (0 error(s), 0 warning(s))",
				"",
				"broken.json",
				'[ERROR] / structural-error: Missing required field "readingOrder"',
				"",
			].join("\n"),
		);
	});

	it("expands globs in sorted order", async () => {
		write("b.json", canonicalFeed());
		write("a.json", canonicalFeed());

		expect(await run(["feed", "*.json", "--json"], io)).toBe(0);
		expect(JSON.parse(stdout).map((outcome: { source: string }) => outcome.source)).toEqual(["a.json", "b.json"]);
	});

	it("prints JSON results", async () => {
		write("good.json", canonicalManifest());

		await run(["manifest", "good.json", "--json"], io);

		expect(JSON.parse(stdout)).toEqual([
			{
				source: "good.json",
				valid: true,
				summary: { errors: 0, warnings: 0, suppressed: 0 },
				findings: [],
			},
		]);
	});

	describe("warnings", () => {
		beforeEach(() => {
			const raw = canonicalManifest();
			raw.links = [];
			write("noself.json", raw);
		});

		it("pass by default", async () => {
			expect(await run(["manifest", "noself.json"], io)).toBe(0);
		});

		it("fail with --fail-on-warnings", async () => {
			expect(await run(["manifest", "noself.json", "--fail-on-warnings"], io)).toBe(1);
		});

		it("fail when the config file says so", async () => {
			write(".shelfcheck.yml", "failOnWarnings: true\n");

			expect(await run(["manifest", "noself.json"], io)).toBe(1);
		});

		it("can be suppressed", async () => {
			expect(await run(["manifest", "noself.json", "--no-color", "-i", "self-link"], io)).toBe(0);
			expect(stdout).toBe("noself.json\nResult: PASS (0 error(s), 0 warning(s), 1 suppressed)\n");
		});

		it("accepts --ignore more than once", async () => {
			const raw = canonicalManifest();
			raw.links = [];
			delete raw.metadata["@type"];
			write("bare.json", raw);

			expect(
				await run(["manifest", "bare.json", "--no-color", "-i", "self-link", "-i", "audiobook-type"], io),
			).toBe(0);
			expect(stdout).toBe("bare.json\nResult: PASS (0 error(s), 0 warning(s), 2 suppressed)\n");
		});
	});

	it("writes results to a file", async () => {
		write("good.json", canonicalManifest());

		expect(await run(["manifest", "good.json", "-o", "out.txt"], io)).toBe(0);
		expect(stdout).toBe("");
		expect(fs.readFileSync(path.join(tempDir, "out.txt"), "utf-8")).toBe(
			"good.json\nResult: PASS (0 error(s), 0 warning(s))\n",
		);
	});

	it("exits with status 2 when the output file cannot be written", async () => {
		write("good.json", canonicalManifest());

		expect(await run(["manifest", "good.json", "-o", path.join("missing-dir", "out.txt")], io)).toBe(2);
		expect(stdout).toBe("");
		expect(stderr).toMatch(/^OutputError: Cannot write results to /);
		expect(stderr).toContain(path.join(tempDir, "missing-dir", "out.txt"));
		expect(stderr).toContain("Suggestion: Check that the output directory exists and is writable");
	});

	it("validates publication lists", async () => {
		write("publications.json", [publicationFixture(1), publicationFixture(2)]);

		expect(await run(["publications", "publications.json", "--no-color"], io)).toBe(0);
		expect(stdout).toBe("publications.json\nResult: PASS (0 error(s), 0 warning(s))\n");
	});

	it("reports publication list findings at list paths", async () => {
		const publication = publicationFixture(1);
		publication.links = [];
		write("publications.json", [publication]);

		expect(await run(["publications", "publications.json", "--no-color"], io)).toBe(1);
		expect(stdout).toContain("[ERROR] /0 acquisition-link-required: Publication has no acquisition link\n");
	});

	it("exits with status 2 when nothing matches", async () => {
		expect(await run(["manifest", "*.json"], io)).toBe(2);
		expect(stderr).toBe("No documents to validate.\n");
	});

	it("exits with status 2 on an invalid configuration", async () => {
		write("good.json", canonicalManifest());
		write(".shelfcheck.yml", "ignroe: []\n");

		expect(await run(["manifest", "good.json"], io)).toBe(2);
		expect(stderr).toMatch(/^ConfigError: Invalid configuration in /);
	});

	it("rejects a bad tolerance", async () => {
		write("good.json", canonicalManifest());

		expect(await run(["manifest", "good.json", "-t", "soon"], io)).toBe(2);
		expect(stderr).toContain("Expected a non-negative number of seconds.");
	});
});
