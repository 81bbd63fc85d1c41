import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["./core/vitest.config.ts", "./cli/vitest.config.ts"],
  },
});
