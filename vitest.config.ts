import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./apps/web", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "tools/src/**/*.test.ts",
      "apps/web/**/*.test.ts",
    ],
    exclude: ["**/node_modules/**", "apps/web/.next/**"],
  },
});
