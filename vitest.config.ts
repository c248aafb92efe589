// CHANGE: Vitest configuration for the functor-kit test suite
// WHY: Native ESM, explicit imports of describe/it/expect, property tests via fast-check
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without shared state between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				branches: 80,
				functions: 80,
				lines: 80,
				statements: 80,
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
