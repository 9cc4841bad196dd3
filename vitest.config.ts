import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["context/**/*.test.ts", "future/**/*.test.ts"],
  },
});
