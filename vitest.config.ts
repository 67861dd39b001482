import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		// Config and CLI tests swap process.env and stdout
		pool: "forks",
		poolOptions: {
			forks: {
				singleFork: true,
			},
		},
		sequence: {
			concurrent: false,
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "html"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/index.ts", "packages/provisioner/src/cli.ts"],
		},
	},
});
