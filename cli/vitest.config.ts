import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		// ProjectRoot tests change the working directory, which worker threads do not allow
		pool: "forks",
		// git-backed tests create real repositories
		testTimeout: 20_000,
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			exclude: ["**/*.test.ts", "src/test/**", "src/client/main.ts", "vitest.config.ts"],
			thresholds: {
				lines: 90,
				functions: 90,
				branches: 85,
				statements: 90,
			},
		},
	},
});
