import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		environment: "node",
		env: {
			SPOTWIRE_LOG_CONSOLE: "false",
		},
	},
});
