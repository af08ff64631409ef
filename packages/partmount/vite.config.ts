import { resolve } from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": resolve(__dirname, "src"),
    },
  },
  build: {
    target: "node20",
    outDir: "dist",
    lib: {
      entry: "src/index.ts",
      formats: ["es"],
      fileName: "index",
    },
    rollupOptions: {
      external: [/^node:/, "citty", "jsonc-parser"],
    },
    minify: false,
    sourcemap: true,
  },
  test: {
    alias: {
      "@": resolve(__dirname, "src"),
    },
    include: ["src/**/__tests__/**/*.test.ts"],
  },
});
