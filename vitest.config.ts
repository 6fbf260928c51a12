import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		globals: true,
		environment: "node",
		hookTimeout: 30000,
		testTimeout: 30000,
	},
});
