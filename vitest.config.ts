import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages export their built output to Node; tests run against the sources.
const coreSrc = fileURLToPath(new URL("./packages/core/src/", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@blob-tier-migrator\/core\/(.+)$/,
        replacement: `${coreSrc}$1/index.ts`,
      },
    ],
  },
  test: {
    globals: true,
    include: ["packages/*/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/**/*.test.ts"],
    },
  },
});
