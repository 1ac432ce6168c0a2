import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["skills/**/tests/**/*.test.ts"],
    environment: "node",
  },
});
