import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    // Workspace packages resolve to their TypeScript sources; no build step first.
    alias: {
      "@buildspan/syntax": fileURLToPath(new URL("./packages/syntax/src/index.ts", import.meta.url)),
      "@buildspan/grammar": fileURLToPath(new URL("./packages/grammar/src/index.ts", import.meta.url)),
    },
  },
});
