import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["src/**/*.test.ts"],
		// property-based suites run a few thousand cases each
		testTimeout: 20_000,
		benchmark: {
			include: ["benches/**/*.bench.ts"],
		},
	},
});
