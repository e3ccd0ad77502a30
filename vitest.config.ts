import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    watch: false,
    setupFiles: ["./vitest.setup.ts"],
    include: ["packages/**/*.test.ts"],
    environment: "node",
  },
});
