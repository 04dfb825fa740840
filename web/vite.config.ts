import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { viteSingleFile } from "vite-plugin-singlefile";
import { fileURLToPath } from "node:url";

const root = fileURLToPath(new URL(".", import.meta.url));

// One widget serves every view, so there is a single HTML entry.
export default defineConfig(({ command }) => ({
  root,
  plugins: [
    react(),
    // Only inline assets for production builds; viteSingleFile breaks Vite HMR
    ...(command === "build" ? [viteSingleFile()] : []),
  ],
  build: {
    outDir: "dist",
    emptyOutDir: true,
    rollupOptions: {
      input: fileURLToPath(new URL("fitness.html", import.meta.url)),
    },
  },
  server: {
    port: 5173,
    proxy: {
      "/mcp": "http://localhost:3001",
    },
  },
}));
