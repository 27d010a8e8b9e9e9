import { defineConfig } from "vitest/config";

export default defineConfig({
  // ─────────────────────────────────────────────
  // Tests run in plain Node; echarts renders SVG server-side
  // ─────────────────────────────────────────────
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },

  // keep function/class names for readable stack traces
  esbuild: {
    keepNames: true,
  },
});
