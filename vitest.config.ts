import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  test: {
    include: ["tests/**/*.{test,spec}.ts", "server/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/.git/**"],
    environment: "node",
    globals: false,
  },
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./shared", import.meta.url)),
    },
  },
});
