import { defineConfig } from "tsdown";

export default defineConfig([
	{
		entry: { index: "./src/index.ts", bin: "./src/cli/bin.ts" },
		platform: "node",
		target: "node20",
		format: "esm",
		dts: false,
		external: ["lzma-native"],
	},
]);
