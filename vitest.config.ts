import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		benchmark: {
			include: ["benches/**/*.bench.ts"],
		},
	},
});
