import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["generator/**/*.test.ts", "cli/**/*.test.ts"],
    environment: "node",
  },
});
