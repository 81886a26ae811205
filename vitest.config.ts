import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
		restoreMocks: true,
		env: {
			LOG_LEVEL: "error",
			LOG_PRETTY: "false",
		},
	},
});
