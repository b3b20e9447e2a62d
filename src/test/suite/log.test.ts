import { describe, it, expect, beforeEach } from "vitest";
import { configureLogger, isLogLevel, logMessage, setLogLevel } from "../../utils/log.js";

interface LogLine {
	level: number;
	msg: string;
	[key: string]: unknown;
}

describe("log", () => {
	let lines: LogLine[];

	beforeEach(() => {
		lines = [];
		configureLogger("warn", {
			write: (message: string) => {
				lines.push(JSON.parse(message));
			},
		});
	});

	it("drops messages above the configured level", () => {
		logMessage("hidden", "info");
		logMessage("shown", "warn");

		expect(lines.map((line) => line.msg)).toEqual(["shown"]);
		expect(lines[0].level).toBe(40);
	});

	it("follows level changes", () => {
		setLogLevel("debug");
		logMessage("detail", "debug", { source: "book.json" });

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({ level: 20, msg: "detail", source: "book.json", name: "shelfcheck" });
	});

	it("recognises level names", () => {
		expect(isLogLevel("debug")).toBe(true);
		expect(isLogLevel("trace")).toBe(false);
	});
});
