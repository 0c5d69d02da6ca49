import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@polyframe/core": `${packages}/core/src/index.ts`,
			"@polyframe/arrow": `${packages}/arrow/src/index.ts`,
		},
	},
	test: {
		globals: true,
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
	},
});
