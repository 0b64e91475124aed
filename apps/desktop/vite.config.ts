import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

const here = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: path.join(here, "src/renderer"),
  // A desktop host loads the renderer via `file://`, so asset URLs stay relative.
  base: "./",
  plugins: [react()],
  build: {
    outDir: path.join(here, "dist/renderer"),
    emptyOutDir: true
  },
  server: {
    port: 5173,
    strictPort: true
  }
});
