import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["linspect/tests/**/*.test.ts"],
		environment: "node",
		clearMocks: true,
		env: {
			NODE_ENV: "test",
		},
	},
});
