import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["./packages/**/test/**/*.{test,spec}.ts"],
		exclude: ["node_modules/**", "**/node_modules/**"],
		coverage: {
			reporter: ["text"],
			include: ["packages/**/src/**/*.ts"],
			exclude: ["**/*.d.ts"],
		},
	},
});
