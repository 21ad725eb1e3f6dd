import { defineConfig } from "tsdown";

// Workspace packages export TypeScript sources, so they are bundled in.
export default defineConfig({
	format: ["esm"],
	entry: ["./src/index.ts"],
	noExternal: ["folio", /^@folio\//],
	sourcemap: true,
	clean: true,
});
