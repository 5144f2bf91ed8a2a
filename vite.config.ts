import { defineConfig } from "vite";
import preact from "@preact/preset-vite";

// Two builds into the same directory: the page bundle, then the worker as a
// single classic script (a service worker cannot import shared chunks).
export default defineConfig(({ mode }) => {
  if (mode === "worker") {
    return {
      build: {
        outDir: "dist/static",
        emptyOutDir: false,
        lib: {
          entry: "src/client/sw.ts",
          formats: ["iife"],
          name: "offlineShellWorker",
          fileName: () => "sw.js",
        },
      },
    };
  }

  return {
    plugins: [preact()],
    build: {
      outDir: "dist/static",
      emptyOutDir: true,
      rollupOptions: {
        input: { "js/pwa-register": "src/client/main.ts" },
        output: { entryFileNames: "[name].js" },
      },
    },
  };
});
