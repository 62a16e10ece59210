import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "runtime/**/*.test.ts"],
    environment: "node",
  },
});
