import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["query-gate/src/**/*.test.ts"],
		environment: "node",
		testTimeout: 20000,
	},
})
