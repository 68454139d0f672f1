import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		exclude: ["**/node_modules", "**/dist"],
		coverage: {
			enabled: true,
			reporter: ["text", "lcov", "json-summary", "json"],
			include: ["packages/**/*.ts"],
			exclude: ["**/node_modules/**", "**/tests/**", "**/dist/**"],
		},
		testTimeout: 10000,
	},
});
