import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		testTimeout: 20_000,
		benchmark: {
			include: ["benches/**/*.bench.ts"],
		},
	},
});
