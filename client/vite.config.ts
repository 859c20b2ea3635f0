import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

const rootDir = resolve(fileURLToPath(new URL(".", import.meta.url)));

// Served by the backend at /static/shared.js and loaded by every template.
export default defineConfig({
  build: {
    outDir: resolve(rootDir, "../dist"),
    emptyOutDir: true,
    sourcemap: true,
    lib: {
      entry: resolve(rootDir, "src/main.ts"),
      name: "privtube",
      formats: ["iife"],
      fileName: () => "shared.js",
    },
  },
});
