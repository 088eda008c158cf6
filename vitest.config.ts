import { fileURLToPath } from "url"
import { defineConfig } from "vitest/config"

const resolvePath = (relative: string) => fileURLToPath(new URL(relative, import.meta.url))

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/__tests__/**/*.test.ts", "apps/*/src/**/__tests__/**/*.test.{ts,tsx}"],
		exclude: ["**/node_modules/**", "**/dist/**"],
	},
	resolve: {
		// Most specific first: workspace packages resolve to their TypeScript sources.
		alias: [
			{ find: "@linepick/core/debug-log", replacement: resolvePath("./packages/core/src/debug-log.ts") },
			{ find: /^@linepick\/core$/, replacement: resolvePath("./packages/core/src/index.ts") },
			{ find: /^@linepick\/types$/, replacement: resolvePath("./packages/types/src/index.ts") },
		],
	},
})
