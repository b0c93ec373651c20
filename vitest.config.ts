import swc from "unplugin-swc";
import { defineConfig } from "vitest/config";

// swc keeps the decorator metadata that NestJS validation pipes read.
export default defineConfig({
  plugins: [swc.vite({ module: { type: "es6" } })],
  test: {
    environment: "node",
    include: ["services/*/tests/**/*.test.ts", "sdks/*/tests/**/*.test.ts"],
  },
});
