import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@setu/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
			"@setu/tarang": fileURLToPath(new URL("./packages/tarang/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		setupFiles: ["./vitest.setup.ts"],
		testTimeout: 10_000,
	},
});
