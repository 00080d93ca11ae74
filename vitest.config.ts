import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@core-platform": source("./packages/core-platform/src/index.ts"),
      "@page-store": source("./packages/page-store/src/index.ts"),
      "@viewer-session": source("./packages/viewer-session/src/index.ts"),
    },
  },
  test: {
    include: ["packages/**/__tests__/**/*.test.ts", "apps/**/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
