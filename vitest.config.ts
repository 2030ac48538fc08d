import path from "node:path";
import { defineConfig } from "vitest/config";

const workspace = (dir: string, name: string) => ({
	find: `@algorunner/${name}`,
	replacement: path.resolve(__dirname, dir, name, "src", "index.ts"),
});

export default defineConfig({
	resolve: {
		alias: [
			workspace("packages", "core"),
			workspace("packages", "indicators"),
			workspace("packages", "risk-engine"),
			workspace("packages", "execution-engine"),
			workspace("packages", "persistence"),
			workspace("packages", "data"),
			workspace("packages", "exchange-ccxt"),
			workspace("packages", "runtime"),
			workspace("apps", "app-di"),
		],
	},
	test: {
		environment: "node",
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
	},
});
