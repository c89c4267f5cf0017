import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		pool: "forks",
		poolOptions: {
			forks: {
				singleFork: true,
			},
		},
		// Signal listeners are registered on shared emitters; keep files sequential
		sequence: {
			concurrent: false,
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/*.test.ts", "**/index.ts", "**/__tests__/**"],
		},
		testTimeout: 30000,
		hookTimeout: 30000,
	},
});
