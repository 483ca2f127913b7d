import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/cli/**", "src/logger.ts"],
			thresholds: {
				// Critical modules - matching and record integrity
				"src/match.ts": { statements: 90, branches: 80 },
				"src/records.ts": { statements: 90, branches: 75 },
				"src/roms.ts": { statements: 90 },
			},
		},
	},
})
