import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@shelfcheck/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["packages/*/tests/**/*.test.ts", "src/test/**/*.test.ts"],
		environment: "node",
	},
});
