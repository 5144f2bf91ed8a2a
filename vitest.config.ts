import { defineConfig } from "vitest/config";
import preact from "@preact/preset-vite";

export default defineConfig({
  plugins: [preact()],
  test: {
    include: ["test/**/*.test.ts", "test/**/*.test.tsx"],
    testTimeout: 15000,
    environmentMatchGlobs: [
      ["test/component/**", "jsdom"],
    ],
  },
});
