/// <reference types="vitest" />
import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
    jsxImportSource: "preact",
  },
  test: {
    coverage: {
      exclude: ["src/frontend/main.tsx", "src/cli/**"],
      include: ["src/**"],
      provider: "v8",
      reporter: ["text", "text-summary", "html"],
      reportsDirectory: "./coverage",
    },
    environment: "node",
    include: ["test/**/*.test.{ts,tsx}"],
  },
});
