import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: /^@greedyflags\/sdk$/, replacement: source("sdk") },
      { find: /^@greedyflags\/shared$/, replacement: source("shared") },
      { find: /^@greedyflags\/core$/, replacement: source("core") },
    ],
  },
});
