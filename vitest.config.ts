import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/__tests__/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: /^@argwright\/sdk\/testing$/, replacement: src("./packages/sdk/src/testing/index.ts") },
      { find: /^@argwright\/sdk$/, replacement: src("./packages/sdk/src/index.ts") },
      { find: /^@argwright\/shared$/, replacement: src("./packages/shared/src/index.ts") },
      { find: /^@argwright\/core$/, replacement: src("./packages/core/src/index.ts") },
    ],
  },
});
